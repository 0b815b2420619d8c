import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger } from '../logging/logger';
import type { Rule } from '../types/rule';
import { type ConfigurationError, errorMessage, type LoadError } from '../types/errors';
import { parseRuleDocument } from './ruleParser';

const log = createLogger('rule-store');

export interface RuleCatalog {
  directory: string;
  rules: readonly Rule[];
  errors: readonly LoadError[];
}

/** Plain view of a rule for listings and JSON output. */
export function describeRule(rule: Rule) {
  return {
    name: rule.id,
    event: rule.event,
    action: rule.action,
    enabled: rule.enabled,
    pattern: rule.pattern?.source,
    file_pattern: rule.filePattern?.source,
    file: rule.source,
  };
}

export type LoadResult = { ok: true; catalog: RuleCatalog } | { ok: false; error: ConfigurationError };

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function getRuleFiles(ruleDir: string): Promise<string[] | ConfigurationError> {
  try {
    const entries = await fs.readdir(ruleDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.md'))
      .map((entry) => entry.name)
      .sort()
      .map((name) => path.join(ruleDir, name));
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    return { kind: 'configuration', path: ruleDir, message: `cannot read rule directory: ${errorMessage(error)}` };
  }
}

/**
 * Reads every rule document in `ruleDir`. Documents that fail to parse are
 * reported in `catalog.errors` and do not stop the others from loading.
 */
export async function loadRules(ruleDir: string): Promise<LoadResult> {
  const files = await getRuleFiles(ruleDir);
  if (!Array.isArray(files)) {
    log.warn({ dir: ruleDir, err: files.message }, 'rule directory unreadable');
    return { ok: false, error: files };
  }

  const rules: Rule[] = [];
  const errors: LoadError[] = [];
  const seen = new Set<string>();

  for (const file of files) {
    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (error) {
      errors.push({ kind: 'load', file, message: `cannot read rule document: ${errorMessage(error)}` });
      continue;
    }

    const result = parseRuleDocument(content, file);
    if (!result.ok) {
      errors.push(result.error);
      continue;
    }
    if (seen.has(result.rule.id)) {
      errors.push({ kind: 'load', file, field: 'name', message: `duplicate rule id "${result.rule.id}"` });
      continue;
    }
    if (result.ignoredFields.length > 0) {
      log.debug({ rule: result.rule.id, fields: result.ignoredFields }, 'fields have no effect for this event');
    }
    seen.add(result.rule.id);
    rules.push(result.rule);
  }

  for (const error of errors) {
    log.warn({ file: error.file, field: error.field }, error.message);
  }
  log.debug({ dir: ruleDir, rules: rules.length, errors: errors.length }, 'rules loaded');

  return { ok: true, catalog: { directory: ruleDir, rules, errors } };
}
