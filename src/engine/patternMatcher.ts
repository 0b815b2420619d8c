import type { EventKind, GuardEvent, Match, Rule } from '../types/rule';

const NO_MATCH: Match = { hit: false };

// Kinds whose events are about a path; file_pattern has no effect on the others.
const PATH_KINDS: readonly EventKind[] = ['file', 'stage'];

export function appliesToKind(rule: Rule, event: GuardEvent): boolean {
  return rule.event === event.kind || rule.event === 'any';
}

/**
 * Tests one rule against one event. The pattern is searched anywhere in the
 * payload; a rule without a pattern fires once the kind and path gates pass.
 * A file or stage event without a path never passes a `file_pattern` gate.
 */
export function matchRule(rule: Rule, event: GuardEvent): Match {
  if (!appliesToKind(rule, event)) {
    return NO_MATCH;
  }

  if (rule.filePattern && PATH_KINDS.includes(event.kind)) {
    if (event.path === undefined || !rule.filePattern.test(event.path)) {
      return NO_MATCH;
    }
  }

  if (!rule.pattern) {
    return { hit: true, matched: '' };
  }

  const found = rule.pattern.exec(event.payload);
  return found ? { hit: true, matched: found[0] } : NO_MATCH;
}
