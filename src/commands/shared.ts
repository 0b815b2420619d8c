import path from 'node:path';
import { getConfig } from '../config/env';
import { decisionToJson, ExitCode, exitCodeFor, formatDecision } from '../engine/decision';
import type { CheckContext, CheckResult } from '../guard/guardService';
import { formatGuardError, type LoadError } from '../types/errors';

export const contextArgs = {
  'rules-dir': {
    type: 'string',
    description: 'Directory of rule documents (default .long-task-harness/rules, or GUARD_RULES_DIR)',
  },
  'progress-file': {
    type: 'string',
    description: 'Progress file that commits should include (default from GUARD_PROGRESS_FILE)',
  },
} as const;

export const outputArgs = {
  json: { type: 'boolean', description: 'Print the decision as JSON' },
  strict: { type: 'boolean', description: 'Exit with 1 when any rule warns' },
} as const;

export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function resolveContext(
  args: { 'rules-dir'?: unknown; 'progress-file'?: unknown },
  cwd: string = process.cwd()
): CheckContext {
  const config = getConfig(process.env, cwd);
  const rulesDir = optionalString(args['rules-dir']);
  return {
    cwd,
    ruleDir: rulesDir ? path.resolve(cwd, rulesDir) : config.ruleDir,
    progressFile: optionalString(args['progress-file']) ?? config.progressFile,
  };
}

export interface Rendered {
  stdout: string[];
  stderr: string[];
  /** An {@link ExitCode}, or git's own status when `git add` fails. */
  exitCode: number;
}

export function renderLoadErrors(errors: readonly LoadError[]): string[] {
  return errors.map((error) => `⚠️ skipped rule document ${formatGuardError(error)}`);
}

export function renderResult(result: CheckResult, options: { json?: boolean; strict?: boolean } = {}): Rendered {
  if (!result.ok) {
    return { stdout: [], stderr: [`error: ${formatGuardError(result.error)}`], exitCode: ExitCode.LoadFailure };
  }

  const { decision, catalog } = result;
  const stdout: string[] = [];
  if (options.json) {
    stdout.push(JSON.stringify(decisionToJson(decision), null, 2));
  } else if (decision.fired.length > 0) {
    stdout.push(formatDecision(decision));
  }

  return {
    stdout,
    stderr: renderLoadErrors(catalog.errors),
    exitCode: exitCodeFor(decision, { strict: options.strict }),
  };
}

export function emit(rendered: Rendered): void {
  for (const line of rendered.stderr) console.error(line);
  for (const line of rendered.stdout) console.log(line);
  process.exitCode = rendered.exitCode;
}
