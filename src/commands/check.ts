import { promises as fs } from 'node:fs';
import path from 'node:path';
import { defineCommand } from 'citty';
import {
  checkBashCommand,
  checkCommitAttempt,
  checkFileEdit,
  checkStagedChanges,
} from '../guard/guardService';
import { ExitCode } from '../engine/decision';
import { stripCommentLines } from '../guard/git';
import { errorMessage } from '../types/errors';
import { contextArgs, emit, optionalString, outputArgs, renderResult, resolveContext } from './shared';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

const bash = defineCommand({
  meta: { name: 'bash', description: 'Check a shell command' },
  args: {
    command: { type: 'positional', description: 'Command line to check', required: true },
    ...contextArgs,
    ...outputArgs,
  },
  async run({ args }) {
    const result = await checkBashCommand(resolveContext(args), args.command);
    emit(renderResult(result, args));
  },
});

const file = defineCommand({
  meta: { name: 'file', description: 'Check a file write' },
  args: {
    path: { type: 'positional', description: 'Path of the file being written', required: true },
    content: { type: 'positional', description: 'New content (default: the file on disk)', required: false },
    stdin: { type: 'boolean', description: 'Read the new content from stdin' },
    ...contextArgs,
    ...outputArgs,
  },
  async run({ args }) {
    const ctx = resolveContext(args);
    let content = optionalString(args.content);
    if (content === undefined) {
      try {
        content = args.stdin ? await readStdin() : await fs.readFile(path.resolve(ctx.cwd, args.path), 'utf8');
      } catch (error) {
        console.error(`error: cannot read ${args.path}: ${errorMessage(error)}`);
        process.exitCode = ExitCode.LoadFailure;
        return;
      }
    }
    const result = await checkFileEdit(ctx, args.path, content);
    emit(renderResult(result, args));
  },
});

const stage = defineCommand({
  meta: { name: 'stage', description: 'Check the staged changes and the progress-file policy' },
  args: { ...contextArgs, ...outputArgs },
  async run({ args }) {
    const result = await checkStagedChanges(resolveContext(args));
    emit(renderResult(result, args));
  },
});

/**
 * The message to check: `--message` as given, else the `--message-file` a
 * commit-msg hook receives, without git's comment lines. Undefined when
 * neither is set.
 */
export async function resolveCommitMessage(
  cwd: string,
  args: { message?: unknown; 'message-file'?: unknown }
): Promise<string | undefined> {
  const message = optionalString(args.message);
  const messageFile = optionalString(args['message-file']);
  if (message !== undefined || messageFile === undefined) {
    return message;
  }
  return stripCommentLines(await fs.readFile(path.resolve(cwd, messageFile), 'utf8'));
}

const commit = defineCommand({
  meta: { name: 'commit', description: 'Check a commit attempt (for pre-commit and commit-msg hooks)' },
  args: {
    message: { type: 'string', alias: 'm', description: 'Commit message (default: empty, as in a pre-commit hook)' },
    'message-file': { type: 'string', description: 'Read the commit message from a file, as commit-msg hooks receive it' },
    ...contextArgs,
    ...outputArgs,
  },
  async run({ args }) {
    const ctx = resolveContext(args);
    let message: string | undefined;
    try {
      message = await resolveCommitMessage(ctx.cwd, args);
    } catch (error) {
      console.error(`error: cannot read ${String(args['message-file'])}: ${errorMessage(error)}`);
      process.exitCode = ExitCode.LoadFailure;
      return;
    }
    const result = await checkCommitAttempt(ctx, message);
    emit(renderResult(result, args));
  },
});

export const checkCommand = defineCommand({
  meta: { name: 'check', description: 'Evaluate an event against the rules' },
  subCommands: { bash, file, stage, commit },
});
