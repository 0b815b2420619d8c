import pino from 'pino';
import { getConfig } from '../config/env';

/**
 * Shared logger. Writes JSON lines to stderr: stdout carries decisions for
 * the CLI and JSON-RPC for the MCP server.
 */
export const logger = pino(
  {
    name: 'long-task-guard',
    level: getConfig().logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  },
  pino.destination({ dest: 2, sync: true })
);

export function createLogger(module: string): pino.Logger {
  return logger.child({ module });
}
