import { spawnSync } from 'node:child_process';
import { createLogger } from '../logging/logger';

const log = createLogger('git');

/**
 * Runs git and returns raw stdout, or null when git is missing or exits
 * non-zero. Callers treat null as "no repository context".
 */
function runGit(cwd: string, args: string[]): Buffer | null {
  const res = spawnSync('git', args, { cwd, maxBuffer: 64 * 1024 * 1024 });
  if (res.error) {
    log.debug({ args, err: res.error.message }, 'git unavailable');
    return null;
  }
  if (res.status !== 0) {
    log.debug({ args, status: res.status, stderr: res.stderr.toString('utf8').trim() }, 'git failed');
    return null;
  }
  return res.stdout;
}

function runGitText(cwd: string, args: string[]): string | null {
  const out = runGit(cwd, args);
  return out === null ? null : out.toString('utf8');
}

export function splitNullSeparated(output: string): string[] {
  return output.split('\0').filter((entry) => entry.length > 0);
}

export function findRepoRoot(cwd: string): string | null {
  const out = runGitText(cwd, ['rev-parse', '--show-toplevel']);
  return out === null ? null : out.trim() || null;
}

export function listStagedPaths(cwd: string): string[] {
  const out = runGitText(cwd, ['diff', '--cached', '--name-only', '-z']);
  return out === null ? [] : splitNullSeparated(out);
}

/**
 * Content of `filePath` as staged in the index. Undefined for deletions and
 * for blobs that look binary.
 */
export function readStagedContent(cwd: string, filePath: string): string | undefined {
  const out = runGit(cwd, ['show', `:${filePath}`]);
  if (out === null || out.includes(0)) {
    return undefined;
  }
  return out.toString('utf8');
}

export function stripCommentLines(message: string): string {
  return message
    .split('\n')
    .filter((line) => !line.startsWith('#'))
    .join('\n')
    .trim();
}

export interface SessionMetadata {
  /** Short hash of HEAD, or `unknown` before the first commit. */
  lastCommit: string;
  branch: string;
  /** Per-file lines of `git diff --cached --stat`, without the summary. */
  fileChanges: string[];
}

export function parseDiffStat(output: string): string[] {
  const lines = output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines.slice(0, -1);
}

/**
 * Where the session stands: the commit to note in the progress file, the
 * branch, and what is about to be committed.
 */
export function readSessionMetadata(cwd: string): SessionMetadata {
  const head = runGitText(cwd, ['rev-parse', '--short', 'HEAD'])?.trim();
  const branch = runGitText(cwd, ['branch', '--show-current'])?.trim();
  return {
    lastCommit: head || 'unknown',
    branch: branch || 'unknown',
    fileChanges: parseDiffStat(runGitText(cwd, ['diff', '--cached', '--stat']) ?? ''),
  };
}

export interface PendingStage {
  path: string;
  removed: boolean;
}

/**
 * Parses `git add --dry-run` output: one `add 'path'` or `remove 'path'`
 * line per entry.
 */
export function parseDryRunAdd(output: string): PendingStage[] {
  const entries: PendingStage[] = [];
  for (const line of output.split('\n')) {
    const found = /^(add|remove) '(.*)'$/.exec(line.trim());
    if (found) {
      entries.push({ path: found[2], removed: found[1] === 'remove' });
    }
  }
  return entries;
}

function addArgs(paths: readonly string[], all: boolean): string[] {
  return all ? ['-A'] : ['--', ...paths];
}

export function listPathsToStage(cwd: string, paths: readonly string[], all: boolean): PendingStage[] {
  const out = runGitText(cwd, ['add', '--dry-run', ...addArgs(paths, all)]);
  return out === null ? [] : parseDryRunAdd(out);
}

export function stagePaths(cwd: string, paths: readonly string[], all: boolean): number {
  const res = spawnSync('git', ['add', ...addArgs(paths, all)], { cwd, stdio: 'inherit' });
  return res.status ?? 1;
}
