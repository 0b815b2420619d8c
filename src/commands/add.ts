import { defineCommand } from 'citty';
import { ExitCode, exitCodeFor, formatDecision } from '../engine/decision';
import { stagePaths } from '../guard/git';
import { type CheckContext, checkPendingAdd } from '../guard/guardService';
import { formatGuardError } from '../types/errors';
import { contextArgs, emit, type Rendered, renderLoadErrors, resolveContext } from './shared';

const RULE = '─'.repeat(60);
const PREVIEW_LIMIT = 10;

export interface AddOptions {
  all?: boolean;
  checkOnly?: boolean;
  force?: boolean;
  strict?: boolean;
}

/**
 * Checks what `git add` would stage and stages it unless a rule blocks (or,
 * under `strict`, warns). `force` stages regardless; `checkOnly` never does.
 */
export async function stageWithGuard(
  ctx: CheckContext,
  paths: readonly string[],
  options: AddOptions = {}
): Promise<Rendered> {
  const all = Boolean(options.all);
  if (!all && paths.length === 0) {
    return { stdout: ['Nothing specified, nothing added.'], stderr: [], exitCode: ExitCode.Allowed };
  }

  const result = await checkPendingAdd(ctx, paths, all);
  if (!result.ok) {
    return { stdout: [], stderr: [`error: ${formatGuardError(result.error)}`], exitCode: ExitCode.LoadFailure };
  }

  const stdout: string[] = [];
  const done = (exitCode: number): Rendered => ({ stdout, stderr: renderLoadErrors(result.catalog.errors), exitCode });

  const { decision, pending } = result;
  if (pending.length === 0) {
    stdout.push('No files to stage.');
    return done(ExitCode.Allowed);
  }

  if (decision.fired.length > 0) {
    stdout.push(`${RULE}\n${decision.blocked ? 'STAGING BLOCKED' : 'STAGING WARNINGS'}\n${RULE}\n`);
    stdout.push(`${formatDecision(decision)}\n`);
  }

  if (exitCodeFor(decision, { strict: options.strict }) !== ExitCode.Allowed) {
    if (!options.force) {
      stdout.push('Use --force to stage anyway.');
      return done(ExitCode.Blocked);
    }
    stdout.push('--force specified, staging anyway.');
  }

  if (options.checkOnly) {
    stdout.push(`Would stage ${pending.length} file(s):`);
    for (const entry of pending.slice(0, PREVIEW_LIMIT)) stdout.push(`  ${entry.path}`);
    if (pending.length > PREVIEW_LIMIT) stdout.push(`  ... and ${pending.length - PREVIEW_LIMIT} more`);
    return done(ExitCode.Allowed);
  }

  const status = stagePaths(ctx.cwd, paths, all);
  if (status === 0) {
    stdout.push(`✓ Staged ${pending.length} file(s)`);
  }
  return done(status);
}

export const addCommand = defineCommand({
  meta: { name: 'add', description: 'Stage files with git after checking them against the rules' },
  args: {
    ...contextArgs,
    all: { type: 'boolean', alias: 'A', description: 'Stage all changes, like git add -A' },
    'check-only': { type: 'boolean', alias: 'c', description: 'Check without staging' },
    force: { type: 'boolean', alias: 'f', description: 'Stage even if rules would block' },
    strict: { type: 'boolean', description: 'Treat warnings as blocking' },
  },
  async run({ args }) {
    const rendered = await stageWithGuard(resolveContext(args), args._, {
      all: args.all,
      checkOnly: args['check-only'],
      force: args.force,
      strict: args.strict,
    });
    emit(rendered);
  },
});
