import { promises as fs } from 'node:fs';
import path from 'node:path';
import matter from 'gray-matter';
import type { ActionType, RuleEvent } from '../types/rule';

export interface RuleTemplate {
  fileName: string;
  frontmatter: {
    name: string;
    enabled: boolean;
    event: RuleEvent;
    pattern?: string;
    file_pattern?: string;
    action: ActionType;
  };
  message: string;
}

export const STARTER_RULES: readonly RuleTemplate[] = [
  {
    fileName: 'warn-dangerous-rm.md',
    frontmatter: { name: 'warn-dangerous-rm', enabled: true, event: 'bash', pattern: 'rm\\s+-rf', action: 'warn' },
    message: [
      '⚠️ **Dangerous rm command detected!**',
      '',
      'Please verify the path is correct before proceeding.',
      'Consider using a safer approach or making a backup.',
    ].join('\n'),
  },
  {
    fileName: 'block-force-push.md',
    frontmatter: {
      name: 'block-force-push',
      enabled: true,
      event: 'bash',
      pattern: 'git\\s+push\\s+.*(--force\\b|-f\\b)',
      action: 'block',
    },
    message: ['🛑 **Force push blocked**', '', 'Rewriting shared history loses other people’s work.'].join('\n'),
  },
  {
    fileName: 'warn-console-log.md',
    frontmatter: {
      name: 'warn-console-log',
      enabled: false,
      event: 'file',
      file_pattern: '\\.tsx?$',
      pattern: 'console\\.log\\(',
      action: 'warn',
    },
    message: ['🐛 **Debug code detected**', '', 'Remember to remove console.log before committing.'].join('\n'),
  },
];

export function renderRuleTemplate(template: RuleTemplate): string {
  return matter.stringify(`\n${template.message}\n`, template.frontmatter);
}

export interface InitResult {
  written: string[];
  skipped: string[];
}

/**
 * Writes the starter rule documents into `ruleDir`. Existing documents are
 * left alone unless `force` is set.
 */
export async function writeStarterRules(ruleDir: string, force = false): Promise<InitResult> {
  await fs.mkdir(ruleDir, { recursive: true });
  const result: InitResult = { written: [], skipped: [] };

  for (const template of STARTER_RULES) {
    const filePath = path.join(ruleDir, template.fileName);
    try {
      await fs.writeFile(filePath, renderRuleTemplate(template), { flag: force ? 'w' : 'wx' });
      result.written.push(filePath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
        result.skipped.push(filePath);
        continue;
      }
      throw error;
    }
  }

  return result;
}
