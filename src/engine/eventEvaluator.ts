import type { Decision, FiredRule, GuardEvent, Rule } from '../types/rule';
import { errorMessage, type EvaluationError } from '../types/errors';
import { createDecision } from './decision';
import { matchRule } from './patternMatcher';

export type EvaluationOutcome = { ok: true; decision: Decision } | { ok: false; error: EvaluationError };

function fire(rule: Rule, event: GuardEvent): FiredRule | null {
  const match = matchRule(rule, event);
  if (!match.hit) {
    return null;
  }
  return {
    rule,
    ruleId: rule.id,
    action: rule.action,
    message: rule.message,
    matched: match.matched,
    ...(event.path !== undefined ? { path: event.path } : {}),
  };
}

/**
 * Runs every enabled rule against the event, in catalog order. Every hit is
 * kept; a block does not stop later rules from firing.
 */
export function evaluate(rules: readonly Rule[], event: GuardEvent): Decision {
  const fired: FiredRule[] = [];
  for (const rule of rules) {
    if (!rule.enabled) continue;
    const entry = fire(rule, event);
    if (entry) fired.push(entry);
  }
  return createDecision(fired);
}

/**
 * Same as {@link evaluate}, but a failure inside the regex engine (stack
 * exhaustion on a pathological payload) comes back as a value naming the rule.
 */
export function tryEvaluate(rules: readonly Rule[], event: GuardEvent): EvaluationOutcome {
  const fired: FiredRule[] = [];
  for (const rule of rules) {
    if (!rule.enabled) continue;
    try {
      const entry = fire(rule, event);
      if (entry) fired.push(entry);
    } catch (error) {
      return { ok: false, error: { kind: 'evaluation', ruleId: rule.id, message: errorMessage(error) } };
    }
  }
  return { ok: true, decision: createDecision(fired) };
}
