import path from 'node:path';
import { ALLOW, createDecision, mergeDecisions } from '../engine/decision';
import { evaluate } from '../engine/eventEvaluator';
import { createLogger } from '../logging/logger';
import type { Decision, Rule } from '../types/rule';
import type { SessionMetadata } from './git';

const log = createLogger('guard');

export const PROGRESS_RULE_ID = 'progress-not-staged';

export interface StagedFile {
  path: string;
  /** Staged content; absent for deletions and binary blobs. */
  content?: string;
}

/**
 * The built-in policy as a rule, so it reports through the same Decision
 * shape as user rules. It is synthesized per call and never read from disk.
 */
export function progressRule(progressFile: string, metadata?: SessionMetadata): Rule {
  const lines = [
    '📝 **Progress file not staged**',
    '',
    `Consider updating ${progressFile} before committing.`,
    'This helps maintain session continuity.',
  ];
  if (metadata) {
    lines.push('', formatSessionMetadata(metadata));
  }
  return {
    id: PROGRESS_RULE_ID,
    enabled: true,
    event: 'any',
    action: 'warn',
    message: lines.join('\n'),
    source: `builtin:${PROGRESS_RULE_ID}`,
  };
}

export function formatSessionMetadata(metadata: SessionMetadata): string {
  return [
    'Session metadata (for the progress file):',
    `  Commits: ${metadata.lastCommit}..HEAD`,
    `  Branch: ${metadata.branch}`,
    '  Files changed:',
    ...metadata.fileChanges.map((change) => `    ${change}`),
  ].join('\n');
}

export function normalizeRepoPath(filePath: string): string {
  const normalized = path.posix.normalize(filePath.replace(/\\/g, '/'));
  return normalized.startsWith('./') ? normalized.slice(2) : normalized;
}

function progressContribution(
  stagedPaths: readonly string[],
  progressFile: string | null,
  metadata?: SessionMetadata
): Decision {
  if (progressFile === null) {
    log.debug('no progress file resolved, skipping progress check');
    return ALLOW;
  }
  const target = normalizeRepoPath(progressFile);
  if (stagedPaths.some((staged) => normalizeRepoPath(staged) === target)) {
    return ALLOW;
  }
  const rule = progressRule(progressFile, metadata);
  return createDecision([{ rule, ruleId: rule.id, action: rule.action, message: rule.message, matched: '' }]);
}

/**
 * Evaluates a staging attempt: one `stage` event per staged file (or a single
 * bare event when nothing is staged), then the progress-file policy. The
 * reminder carries `metadata` when given.
 */
export function checkStage(
  rules: readonly Rule[],
  staged: readonly StagedFile[],
  progressFile: string | null,
  metadata?: SessionMetadata
): Decision {
  const perFile =
    staged.length === 0
      ? [evaluate(rules, { kind: 'stage', payload: '' })]
      : staged.map((file) =>
          evaluate(rules, { kind: 'stage', payload: file.content ?? '', path: normalizeRepoPath(file.path) })
        );

  const builtin =
    staged.length === 0
      ? ALLOW
      : progressContribution(
          staged.map((file) => file.path),
          progressFile,
          metadata
        );

  return mergeDecisions(...perFile, builtin);
}

export function checkCommit(
  rules: readonly Rule[],
  message: string,
  stagedPaths: readonly string[],
  progressFile: string | null,
  metadata?: SessionMetadata
): Decision {
  return mergeDecisions(
    evaluate(rules, { kind: 'commit', payload: message }),
    progressContribution(stagedPaths, progressFile, metadata)
  );
}
