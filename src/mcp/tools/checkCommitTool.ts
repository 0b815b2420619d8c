import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { checkCommitAttempt } from '../../guard/guardService';
import { checkResultContent, type ContextProvider } from './toolResult';

export function registerCheckCommitTool(server: McpServer, getContext: ContextProvider) {
  server.tool(
    'guard_check_commit',
    'Checks a commit attempt: the message against commit rules and the staged paths against the progress-file policy.',
    {
      message: z.string().optional().describe('Commit message; commit rules see an empty message when omitted'),
    },
    async ({ message }) => checkResultContent(await checkCommitAttempt(getContext(), message))
  );
}
