import { spawnSync } from 'node:child_process';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Rule } from '../src/types/rule';

export function makeRule(overrides: Partial<Rule> & Pick<Rule, 'id'>): Rule {
  return {
    enabled: true,
    event: 'bash',
    action: 'warn',
    message: `${overrides.id} fired`,
    source: `/rules/${overrides.id}.md`,
    ...overrides,
  };
}

export async function makeTempDir(prefix = 'ltg-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeRuleDir(files: Record<string, string>): Promise<string> {
  const dir = await makeTempDir('ltg-rules-');
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content, 'utf8');
  }
  return dir;
}

export function ruleDoc(frontmatter: string[], body = 'Rule fired.'): string {
  return ['---', ...frontmatter, '---', '', body, ''].join('\n');
}

export function git(cwd: string, ...args: string[]): string {
  const res = spawnSync('git', args, { cwd, encoding: 'utf8' });
  if (res.status !== 0) throw new Error(`git ${args.join(' ')} failed: ${res.stderr}`);
  return res.stdout;
}

/** A fresh repository on branch `trunk` with a local identity for commits. */
export function initRepo(cwd: string): void {
  git(cwd, 'init', '-q');
  git(cwd, 'symbolic-ref', 'HEAD', 'refs/heads/trunk');
  git(cwd, 'config', 'user.name', 'Test User');
  git(cwd, 'config', 'user.email', 'test@example.com');
  git(cwd, 'config', 'commit.gpgsign', 'false');
}
