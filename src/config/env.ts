import { existsSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export const HARNESS_DIR_NAME = '.long-task-harness';
export const DEFAULT_PROGRESS_FILE = `${HARNESS_DIR_NAME}/long-task-progress.md`;

const LogLevelSchema = z
  .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
  .catch('warn');

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface Config {
  ruleDir: string;
  /** Relative paths are resolved against the repository root. */
  progressFile: string;
  logLevel: LogLevel;
}

/**
 * Nearest ancestor of `cwd` (inclusive) that holds a harness directory.
 */
export function findHarnessRoot(cwd: string): string | null {
  let current = path.resolve(cwd);
  for (;;) {
    if (existsSync(path.join(current, HARNESS_DIR_NAME))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

export function getConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
  const harnessRoot = findHarnessRoot(cwd) ?? path.resolve(cwd);
  const defaultRuleDir = path.join(harnessRoot, HARNESS_DIR_NAME, 'rules');

  return {
    ruleDir: env.GUARD_RULES_DIR ? path.resolve(cwd, env.GUARD_RULES_DIR) : defaultRuleDir,
    progressFile: env.GUARD_PROGRESS_FILE || DEFAULT_PROGRESS_FILE,
    logLevel: LogLevelSchema.parse(env.LOG_LEVEL),
  };
}
