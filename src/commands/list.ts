import { defineCommand } from 'citty';
import { ExitCode } from '../engine/decision';
import { isRuleEvent } from '../rules/ruleParser';
import { describeRule, loadRules, type RuleCatalog } from '../rules/ruleStore';
import { renderRuleTemplate, STARTER_RULES } from '../rules/starterRules';
import { formatGuardError } from '../types/errors';
import type { Rule } from '../types/rule';
import { contextArgs, optionalString, resolveContext } from './shared';

export function formatCatalog(catalog: RuleCatalog, rules: readonly Rule[] = catalog.rules): string {
  const lines: string[] = [];

  if (rules.length === 0) {
    const [example] = STARTER_RULES;
    lines.push('No rules found.', '', `Create rules in: ${catalog.directory}/`, '', 'Example rule file:', renderRuleTemplate(example));
  } else {
    lines.push(`Rules directory: ${catalog.directory}`, '');
    for (const rule of rules) {
      const status = rule.enabled ? '✓' : '○';
      const icon = rule.action === 'block' ? '🛑' : '⚠️';
      lines.push(`${status} ${icon} ${rule.id}`, `   Event: ${rule.event}`);
      if (rule.pattern) lines.push(`   Pattern: ${rule.pattern.source}`);
      if (rule.filePattern) lines.push(`   File: ${rule.filePattern.source}`);
      lines.push('');
    }
  }

  if (catalog.errors.length > 0) {
    lines.push('Skipped documents:');
    for (const error of catalog.errors) {
      lines.push(`   ${formatGuardError(error)}`);
    }
  }

  return lines.join('\n').trimEnd();
}

export const listCommand = defineCommand({
  meta: { name: 'list', description: 'List the loaded rules without evaluating anything' },
  args: {
    ...contextArgs,
    event: { type: 'string', description: 'Only show rules for this event' },
    json: { type: 'boolean', description: 'Print the catalog as JSON' },
  },
  async run({ args }) {
    const ctx = resolveContext(args);
    const loaded = await loadRules(ctx.ruleDir);
    if (!loaded.ok) {
      console.error(`error: ${formatGuardError(loaded.error)}`);
      process.exitCode = ExitCode.LoadFailure;
      return;
    }

    const event = optionalString(args.event);
    if (event !== undefined && !isRuleEvent(event)) {
      console.error(`error: unknown event "${event}"`);
      process.exitCode = ExitCode.LoadFailure;
      return;
    }

    const { catalog } = loaded;
    const rules = event ? catalog.rules.filter((rule) => rule.event === event) : catalog.rules;

    if (args.json) {
      console.log(
        JSON.stringify({ directory: catalog.directory, rules: rules.map(describeRule), errors: catalog.errors }, null, 2)
      );
      return;
    }
    console.log(formatCatalog(catalog, rules));
  },
});
