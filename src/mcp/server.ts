import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLogger } from '../logging/logger';
import { registerCheckBashTool } from './tools/checkBashTool';
import { registerCheckCommitTool } from './tools/checkCommitTool';
import { registerCheckFileTool } from './tools/checkFileTool';
import { registerCheckStageTool } from './tools/checkStageTool';
import { registerHealthTool } from './tools/healthTool';
import { registerListRulesTool } from './tools/listRulesTool';
import type { ContextProvider } from './tools/toolResult';

const log = createLogger('mcp');

export function createServer(info: { name: string; version: string }, getContext: ContextProvider): McpServer {
  const server = new McpServer(info);

  registerHealthTool(server, getContext);
  registerListRulesTool(server, getContext);
  registerCheckBashTool(server, getContext);
  registerCheckFileTool(server, getContext);
  registerCheckStageTool(server, getContext);
  registerCheckCommitTool(server, getContext);

  return server;
}

/**
 * Serves over stdio. Nothing else may write to stdout while it runs.
 */
export async function startServer(server: McpServer): Promise<void> {
  await server.connect(new StdioServerTransport());
  log.info('mcp server listening on stdio');
}

export async function stopServer(server: McpServer): Promise<void> {
  await server.close();
  log.info('mcp server stopped');
}
