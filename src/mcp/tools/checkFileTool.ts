import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { checkFileEdit } from '../../guard/guardService';
import { checkResultContent, type ContextProvider } from './toolResult';

export function registerCheckFileTool(server: McpServer, getContext: ContextProvider) {
  server.tool(
    'guard_check_file',
    'Checks a file write against the guard rules.',
    {
      file_path: z.string().describe('Path of the file being written'),
      content: z.string().describe('The new file content'),
    },
    async ({ file_path, content }) => checkResultContent(await checkFileEdit(getContext(), file_path, content))
  );
}
