import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { DEFAULT_PROGRESS_FILE } from '../../src/config/env';
import { createServer, stopServer } from '../../src/mcp/server';
import { ruleDoc, writeRuleDir } from '../helpers';

const TextResult = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
});

function parseText(result: unknown): unknown {
  return JSON.parse(TextResult.parse(result).content[0].text);
}

describe('mcp server', () => {
  const cleanup: Array<() => Promise<void>> = [];

  afterEach(async () => {
    while (cleanup.length > 0) {
      const close = cleanup.pop();
      if (close) await close();
    }
  });

  async function connect(ruleDir: string) {
    const server = createServer({ name: 'test-guard', version: '0.0.0' }, () => ({
      cwd: ruleDir,
      ruleDir,
      progressFile: DEFAULT_PROGRESS_FILE,
    }));
    const client = new Client({ name: 'test-client', version: '0.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
    cleanup.push(
      () => client.close(),
      () => stopServer(server)
    );
    return client;
  }

  it('registers the guard tools', async () => {
    const client = await connect(await writeRuleDir({}));

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'guard_check_bash',
      'guard_check_commit',
      'guard_check_file',
      'guard_check_stage',
      'guard_health',
      'guard_list_rules',
    ]);
  });

  it('checks a shell command', async () => {
    const dir = await writeRuleDir({
      'rm.md': ruleDoc(['name: block-rm', 'event: bash', 'pattern: rm\\s+-rf', 'action: block'], 'No rm -rf.'),
    });
    const client = await connect(dir);

    const result = await client.callTool({ name: 'guard_check_bash', arguments: { command: 'rm -rf /tmp/x' } });

    expect(parseText(result)).toEqual({
      ok: true,
      decision: 'block',
      blocked: true,
      fired: [{ rule: 'block-rm', action: 'block', message: 'No rm -rf.', matched: 'rm -rf' }],
      load_errors: [],
    });
  });

  it('lists rules with filters', async () => {
    const dir = await writeRuleDir({
      'a.md': ruleDoc(['name: a', 'event: bash', 'pattern: a', 'action: warn']),
      'b.md': ruleDoc(['name: b', 'enabled: false', 'event: commit', 'pattern: b', 'action: warn']),
    });
    const client = await connect(dir);

    const result = await client.callTool({ name: 'guard_list_rules', arguments: { enabled: false } });

    expect(parseText(result)).toEqual({
      rules: [
        {
          name: 'b',
          event: 'commit',
          action: 'warn',
          enabled: false,
          pattern: 'b',
          file: `${dir}/b.md`,
        },
      ],
      errors: [],
    });
  });
});
