export type EventKind = 'bash' | 'file' | 'stage' | 'commit';
export type RuleEvent = EventKind | 'any';
export type ActionType = 'warn' | 'block';

export const EVENT_KINDS: readonly EventKind[] = ['bash', 'file', 'stage', 'commit'];
export const RULE_EVENTS: readonly RuleEvent[] = [...EVENT_KINDS, 'any'];

export interface Rule {
  id: string;
  enabled: boolean;
  event: RuleEvent;
  action: ActionType;
  pattern?: RegExp;
  filePattern?: RegExp;
  message: string;
  /** Document the rule was read from, or `builtin:<id>` for synthetic rules. */
  source: string;
}

export interface GuardEvent {
  kind: EventKind;
  payload: string;
  path?: string;
}

export type Match = { hit: true; matched: string } | { hit: false };

export interface FiredRule {
  rule: Rule;
  ruleId: string;
  action: ActionType;
  message: string;
  matched: string;
  path?: string;
}

export interface Decision {
  blocked: boolean;
  fired: readonly FiredRule[];
}
