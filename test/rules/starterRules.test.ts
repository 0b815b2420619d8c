import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { evaluate } from '../../src/engine/eventEvaluator';
import { loadRules } from '../../src/rules/ruleStore';
import { writeStarterRules } from '../../src/rules/starterRules';
import { makeTempDir } from '../helpers';

describe('writeStarterRules', () => {
  it('writes documents the rule store can load', async () => {
    const dir = path.join(await makeTempDir(), 'rules');

    const init = await writeStarterRules(dir);
    const result = await loadRules(dir);

    expect(init.written).toHaveLength(3);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.catalog.errors).toEqual([]);
    expect(result.catalog.rules.map((rule) => [rule.id, rule.enabled])).toEqual([
      ['block-force-push', true],
      ['warn-console-log', false],
      ['warn-dangerous-rm', true],
    ]);
  });

  it('keeps existing documents unless forced', async () => {
    const dir = await makeTempDir();
    await writeStarterRules(dir);

    const again = await writeStarterRules(dir);
    const forced = await writeStarterRules(dir, true);

    expect(again.written).toEqual([]);
    expect(again.skipped).toHaveLength(3);
    expect(forced.written).toHaveLength(3);
  });

  it('ships rules that fire on the commands they describe', async () => {
    const dir = await makeTempDir();
    await writeStarterRules(dir);
    const result = await loadRules(dir);
    if (!result.ok) throw new Error('load failed');

    const push = evaluate(result.catalog.rules, { kind: 'bash', payload: 'git push --force origin main' });
    const rm = evaluate(result.catalog.rules, { kind: 'bash', payload: 'rm -rf build' });

    expect(push.blocked).toBe(true);
    expect(push.fired.map((entry) => entry.ruleId)).toEqual(['block-force-push']);
    expect(rm.blocked).toBe(false);
    expect(rm.fired.map((entry) => entry.ruleId)).toEqual(['warn-dangerous-rm']);
  });
});
