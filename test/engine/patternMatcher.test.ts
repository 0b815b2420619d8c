import { describe, expect, it } from 'vitest';
import { matchRule } from '../../src/engine/patternMatcher';
import { makeRule } from '../helpers';

describe('matchRule', () => {
  it('finds the pattern anywhere in the payload and reports the matched text', () => {
    const rule = makeRule({ id: 'rm', event: 'bash', pattern: /rm\s+-rf/ });

    expect(matchRule(rule, { kind: 'bash', payload: 'cd /tmp && rm  -rf x' })).toEqual({ hit: true, matched: 'rm  -rf' });
  });

  it('ignores events of another kind', () => {
    const rule = makeRule({ id: 'rm', event: 'bash', pattern: /rm/ });

    expect(matchRule(rule, { kind: 'commit', payload: 'rm' })).toEqual({ hit: false });
  });

  it('applies any-rules to every kind', () => {
    const rule = makeRule({ id: 'secret', event: 'any', pattern: /SECRET/ });

    for (const kind of ['bash', 'file', 'stage', 'commit'] as const) {
      expect(matchRule(rule, { kind, payload: 'x SECRET y' }).hit).toBe(true);
    }
  });

  it('stops at the file_pattern gate when the path does not match', () => {
    const rule = makeRule({ id: 'console', event: 'file', filePattern: /\.ts$/, pattern: /console\.log\(/ });

    expect(matchRule(rule, { kind: 'file', path: 'a.py', payload: 'console.log(1)' })).toEqual({ hit: false });
    expect(matchRule(rule, { kind: 'file', path: 'a.ts', payload: 'console.log(1)' })).toEqual({
      hit: true,
      matched: 'console.log(',
    });
  });

  it('does not fire a path-restricted rule on a stage or file event without a path', () => {
    const env = makeRule({ id: 'no-env', event: 'stage', filePattern: /\.env$/, action: 'block' });
    const debuggerRule = makeRule({ id: 'debugger', event: 'file', filePattern: /\.ts$/, pattern: /debugger/ });

    expect(matchRule(env, { kind: 'stage', payload: '' })).toEqual({ hit: false });
    expect(matchRule(debuggerRule, { kind: 'file', payload: 'debugger;' })).toEqual({ hit: false });
  });

  it('ignores file_pattern on bash and commit events reached by any-rules', () => {
    const rule = makeRule({ id: 'secret', event: 'any', filePattern: /\.env$/, pattern: /SECRET/ });

    expect(matchRule(rule, { kind: 'bash', payload: 'echo SECRET' }).hit).toBe(true);
    expect(matchRule(rule, { kind: 'commit', payload: 'add SECRET' }).hit).toBe(true);
    expect(matchRule(rule, { kind: 'stage', path: 'app.ts', payload: 'SECRET' }).hit).toBe(false);
  });

  it('fires a pattern-less stage rule once the gates pass', () => {
    const rule = makeRule({ id: 'env', event: 'stage', filePattern: /\.env$/ });

    expect(matchRule(rule, { kind: 'stage', path: 'config/.env', payload: '' })).toEqual({ hit: true, matched: '' });
    expect(matchRule(rule, { kind: 'stage', path: 'config/app.ts', payload: '' })).toEqual({ hit: false });
  });

  it('does not fold case', () => {
    const rule = makeRule({ id: 'drop', event: 'bash', pattern: /DROP/ });

    expect(matchRule(rule, { kind: 'bash', payload: 'drop table' }).hit).toBe(false);
  });
});
