import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { checkStagedChanges } from '../../guard/guardService';
import { checkResultContent, type ContextProvider } from './toolResult';

export function registerCheckStageTool(server: McpServer, getContext: ContextProvider) {
  server.tool(
    'guard_check_stage',
    'Checks the currently staged changes, including whether the progress file is staged.',
    {},
    async () => checkResultContent(await checkStagedChanges(getContext()))
  );
}
