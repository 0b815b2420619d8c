import { promises as fs } from 'node:fs';
import path from 'node:path';
import { tryEvaluate } from '../engine/eventEvaluator';
import { createLogger } from '../logging/logger';
import { loadRules, type RuleCatalog } from '../rules/ruleStore';
import { type ConfigurationError, errorMessage, type EvaluationError } from '../types/errors';
import type { Decision, GuardEvent } from '../types/rule';
import {
  findRepoRoot,
  listPathsToStage,
  listStagedPaths,
  type PendingStage,
  readSessionMetadata,
  readStagedContent,
} from './git';
import { checkCommit, checkStage, type StagedFile } from './progressGuard';
import { resolveProgressFile } from './repoContext';

const log = createLogger('guard-service');

export interface CheckContext {
  ruleDir: string;
  progressFile: string;
  cwd: string;
}

export type CheckResult =
  | { ok: true; decision: Decision; catalog: RuleCatalog }
  | { ok: false; error: ConfigurationError | EvaluationError };

async function withCatalog(
  ctx: CheckContext,
  run: (catalog: RuleCatalog) => Decision
): Promise<CheckResult> {
  const loaded = await loadRules(ctx.ruleDir);
  if (!loaded.ok) {
    return loaded;
  }
  try {
    const decision = run(loaded.catalog);
    log.debug({ fired: decision.fired.map((entry) => entry.ruleId), blocked: decision.blocked }, 'evaluated');
    return { ok: true, decision, catalog: loaded.catalog };
  } catch (error) {
    return { ok: false, error: { kind: 'evaluation', message: errorMessage(error) } };
  }
}

async function evaluateEvent(ctx: CheckContext, event: GuardEvent): Promise<CheckResult> {
  const loaded = await loadRules(ctx.ruleDir);
  if (!loaded.ok) {
    return loaded;
  }
  const outcome = tryEvaluate(loaded.catalog.rules, event);
  return outcome.ok ? { ok: true, decision: outcome.decision, catalog: loaded.catalog } : outcome;
}

export function checkBashCommand(ctx: CheckContext, command: string): Promise<CheckResult> {
  return evaluateEvent(ctx, { kind: 'bash', payload: command });
}

export function checkFileEdit(ctx: CheckContext, filePath: string, content: string): Promise<CheckResult> {
  return evaluateEvent(ctx, { kind: 'file', payload: content, path: filePath });
}

function collectStagedFiles(cwd: string, paths: readonly string[]): StagedFile[] {
  return paths.map((stagedPath) => ({ path: stagedPath, content: readStagedContent(cwd, stagedPath) }));
}

export function checkStagedChanges(ctx: CheckContext): Promise<CheckResult> {
  const staged = collectStagedFiles(ctx.cwd, listStagedPaths(ctx.cwd));
  const progressFile = resolveProgressFile(ctx.progressFile, ctx.cwd);
  const metadata = progressFile === null ? undefined : readSessionMetadata(ctx.cwd);
  return withCatalog(ctx, (catalog) => checkStage(catalog.rules, staged, progressFile, metadata));
}

/**
 * Checks a commit attempt. Without a message (a pre-commit hook, where git has
 * not written one yet) the commit event carries an empty payload.
 */
export function checkCommitAttempt(ctx: CheckContext, message = ''): Promise<CheckResult> {
  const stagedPaths = listStagedPaths(ctx.cwd);
  const progressFile = resolveProgressFile(ctx.progressFile, ctx.cwd);
  const metadata = progressFile === null ? undefined : readSessionMetadata(ctx.cwd);
  return withCatalog(ctx, (catalog) => checkCommit(catalog.rules, message, stagedPaths, progressFile, metadata));
}

async function readWorkingTreeFile(root: string, entry: PendingStage): Promise<StagedFile> {
  if (entry.removed) {
    return { path: entry.path };
  }
  try {
    const data = await fs.readFile(path.join(root, entry.path));
    return data.includes(0) ? { path: entry.path } : { path: entry.path, content: data.toString('utf8') };
  } catch (error) {
    log.debug({ path: entry.path, err: errorMessage(error) }, 'unreadable working tree file');
    return { path: entry.path };
  }
}

export type AddCheckResult =
  | { ok: true; decision: Decision; catalog: RuleCatalog; pending: PendingStage[] }
  | { ok: false; error: ConfigurationError | EvaluationError };

/**
 * Checks what `git add` would stage, using working tree content, before
 * anything reaches the index.
 */
export async function checkPendingAdd(ctx: CheckContext, paths: readonly string[], all: boolean): Promise<AddCheckResult> {
  const pending = listPathsToStage(ctx.cwd, paths, all);
  const root = findRepoRoot(ctx.cwd) ?? ctx.cwd;
  const staged = await Promise.all(pending.map((entry) => readWorkingTreeFile(root, entry)));
  const progressFile = resolveProgressFile(ctx.progressFile, ctx.cwd);
  const result = await withCatalog(ctx, (catalog) => checkStage(catalog.rules, staged, progressFile));
  return result.ok ? { ...result, pending } : result;
}
