import type { Decision, FiredRule } from '../types/rule';

export const ExitCode = {
  Allowed: 0,
  Blocked: 1,
  LoadFailure: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function createDecision(fired: readonly FiredRule[]): Decision {
  return {
    blocked: fired.some((entry) => entry.action === 'block'),
    fired,
  };
}

export const ALLOW: Decision = createDecision([]);

export function mergeDecisions(...decisions: Decision[]): Decision {
  return createDecision(decisions.flatMap((decision) => decision.fired));
}

export function verdict(decision: Decision): 'allow' | 'warn' | 'block' {
  if (decision.blocked) return 'block';
  return decision.fired.length > 0 ? 'warn' : 'allow';
}

/**
 * Strict mode lets callers escalate warnings; the engine itself never does.
 */
export function exitCodeFor(decision: Decision, options: { strict?: boolean } = {}): ExitCode {
  if (decision.blocked) return ExitCode.Blocked;
  if (options.strict && decision.fired.length > 0) return ExitCode.Blocked;
  return ExitCode.Allowed;
}

export function formatFiredRule(entry: FiredRule): string {
  const icon = entry.action === 'block' ? '🛑' : '⚠️';
  const where = entry.path ? ` (${entry.path})` : '';
  return `${icon} [${entry.ruleId}]${where}\n${entry.message}`;
}

/**
 * Human-readable rendering, warnings first. Empty when nothing fired.
 */
export function formatDecision(decision: Decision): string {
  const warnings = decision.fired.filter((entry) => entry.action === 'warn');
  const blockers = decision.fired.filter((entry) => entry.action === 'block');
  return [...warnings, ...blockers].map(formatFiredRule).join('\n\n');
}

export interface DecisionJson {
  decision: 'allow' | 'warn' | 'block';
  blocked: boolean;
  fired: Array<{ rule: string; action: string; message: string; matched: string; path?: string }>;
}

export function decisionToJson(decision: Decision): DecisionJson {
  return {
    decision: verdict(decision),
    blocked: decision.blocked,
    fired: decision.fired.map((entry) => ({
      rule: entry.ruleId,
      action: entry.action,
      message: entry.message,
      matched: entry.matched,
      ...(entry.path !== undefined ? { path: entry.path } : {}),
    })),
  };
}
