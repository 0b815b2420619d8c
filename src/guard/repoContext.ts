import path from 'node:path';
import { findRepoRoot } from './git';
import { normalizeRepoPath } from './progressGuard';

/**
 * Expresses `progressFile` relative to `root`, the form git reports staged
 * paths in. Null when it points outside the repository.
 */
export function toRepoRelative(root: string, progressFile: string): string | null {
  const relative = path.relative(root, path.resolve(root, progressFile));
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    return null;
  }
  return normalizeRepoPath(relative);
}

export function resolveProgressFile(progressFile: string, cwd: string): string | null {
  const root = findRepoRoot(cwd);
  return root === null ? null : toRepoRelative(root, progressFile);
}
