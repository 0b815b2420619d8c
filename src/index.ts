#!/usr/bin/env node
import { fileURLToPath } from 'node:url';
import { runMain as _runMain, defineCommand } from 'citty';
import { version } from '../package.json';
import { addCommand } from './commands/add';
import { checkCommand } from './commands/check';
import { initCommand } from './commands/init';
import { listCommand } from './commands/list';
import { mcpCommand } from './commands/mcp';

const cli = defineCommand({
  meta: {
    name: 'long-task-guard',
    version,
    description: 'Check shell commands, file writes, staging and commits against declarative rules',
  },
  subCommands: {
    check: checkCommand,
    list: listCommand,
    init: initCommand,
    add: addCommand,
    mcp: mcpCommand,
  },
});

export const runMain = () => _runMain(cli);

// Self-invoking if executed directly
if (import.meta.url.startsWith('file:') && process.argv[1] === fileURLToPath(import.meta.url)) {
  void runMain();
}
