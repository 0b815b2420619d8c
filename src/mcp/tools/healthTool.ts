import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { version } from '../../../package.json';
import { loadRules } from '../../rules/ruleStore';
import { type ContextProvider, jsonContent } from './toolResult';

export function registerHealthTool(server: McpServer, getContext: ContextProvider) {
  server.tool(
    'guard_health',
    'Returns status and configuration information about the server.',
    {},
    async () => {
      const ctx = getContext();
      const loaded = await loadRules(ctx.ruleDir);
      return jsonContent({
        status: loaded.ok ? 'ok' : 'degraded',
        version,
        rule_directory: ctx.ruleDir,
        progress_file: ctx.progressFile,
        rules_loaded: loaded.ok ? loaded.catalog.rules.length : 0,
        load_errors: loaded.ok ? loaded.catalog.errors.length : 1,
        timestamp: new Date().toISOString(),
      });
    }
  );
}
