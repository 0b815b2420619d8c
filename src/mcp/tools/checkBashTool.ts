import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { checkBashCommand } from '../../guard/guardService';
import { checkResultContent, type ContextProvider } from './toolResult';

export function registerCheckBashTool(server: McpServer, getContext: ContextProvider) {
  server.tool(
    'guard_check_bash',
    'Checks a shell command against the guard rules before it runs.',
    {
      command: z.string().describe('The shell command to check'),
    },
    async ({ command }) => checkResultContent(await checkBashCommand(getContext(), command))
  );
}
