import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { describeRule, loadRules } from '../../rules/ruleStore';
import { formatGuardError } from '../../types/errors';
import { type ContextProvider, jsonContent } from './toolResult';

export function registerListRulesTool(server: McpServer, getContext: ContextProvider) {
  server.tool(
    'guard_list_rules',
    'Lists the rules in the rule directory, including disabled ones.',
    {
      event: z.enum(['bash', 'file', 'stage', 'commit', 'any']).optional().describe('Filter by event'),
      enabled: z.boolean().optional().describe('Filter by enabled status'),
    },
    async ({ event, enabled }) => {
      const loaded = await loadRules(getContext().ruleDir);
      if (!loaded.ok) {
        return jsonContent({ ok: false, error: formatGuardError(loaded.error) }, true);
      }

      let rules = loaded.catalog.rules;
      if (event) {
        rules = rules.filter((r) => r.event === event);
      }
      if (enabled !== undefined) {
        rules = rules.filter((r) => r.enabled === enabled);
      }

      return jsonContent({
        rules: rules.map(describeRule),
        errors: loaded.catalog.errors.map(formatGuardError),
      });
    }
  );
}
