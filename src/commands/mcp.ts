import { defineCommand } from 'citty';
import { version } from '../../package.json';
import { createServer, startServer, stopServer } from '../mcp/server';
import { errorMessage } from '../types/errors';
import { contextArgs, resolveContext } from './shared';

export const mcpCommand = defineCommand({
  meta: { name: 'mcp', description: 'Serve the guard checks as MCP tools over stdio' },
  args: { ...contextArgs },
  async run({ args }) {
    const server = createServer({ name: 'long-task-guard', version }, () => resolveContext(args));

    const shutdown = () => {
      stopServer(server).catch((error: unknown) => {
        console.error(`error: ${errorMessage(error)}`);
        process.exitCode = 1;
      });
    };
    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);

    await startServer(server);
  },
});
