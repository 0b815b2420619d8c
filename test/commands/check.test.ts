import { promises as fs } from 'node:fs';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { resolveCommitMessage } from '../../src/commands/check';
import { makeTempDir } from '../helpers';

describe('resolveCommitMessage', () => {
  it('reads a commit-msg file without comment lines', async () => {
    const dir = await makeTempDir('ltg-msg-');
    await fs.writeFile(path.join(dir, 'COMMIT_MSG'), 'WIP: parser\n\n# Please enter the commit message\n# Lines starting with # are ignored\n');

    expect(await resolveCommitMessage(dir, { 'message-file': 'COMMIT_MSG' })).toBe('WIP: parser');
  });

  it('prefers an explicit message over the file', async () => {
    const dir = await makeTempDir('ltg-msg-');

    expect(await resolveCommitMessage(dir, { message: 'fix: bug', 'message-file': 'missing' })).toBe('fix: bug');
  });

  it('is undefined when neither is given', async () => {
    expect(await resolveCommitMessage('/', {})).toBeUndefined();
  });

  it('rejects when the message file cannot be read', async () => {
    const dir = await makeTempDir('ltg-msg-');

    await expect(resolveCommitMessage(dir, { 'message-file': 'missing' })).rejects.toThrow();
  });
});
