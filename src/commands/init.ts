import { defineCommand } from 'citty';
import { writeStarterRules } from '../rules/starterRules';
import { contextArgs, resolveContext } from './shared';

export const initCommand = defineCommand({
  meta: { name: 'init', description: 'Write the starter rule documents' },
  args: {
    'rules-dir': contextArgs['rules-dir'],
    force: { type: 'boolean', description: 'Overwrite existing starter documents' },
  },
  async run({ args }) {
    const ctx = resolveContext(args);
    const { written, skipped } = await writeStarterRules(ctx.ruleDir, args.force);
    for (const file of written) console.log(`created ${file}`);
    for (const file of skipped) console.log(`kept existing ${file}`);
    console.log("Default rules created. Run 'list' to see them.");
  },
});
