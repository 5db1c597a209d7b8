import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { parsePatch } from '@patchfix/repo';
import { MalformedPatchError, MemoryLogger } from '@patchfix/shared';
import { PatchWriter } from './patch-writer';

const HEADER = [
  'From 1234567890abcdef1234567890abcdef12345678 Mon Sep 17 00:00:00 2001',
  'From: Dev <dev@example.com>',
  'Subject: [PATCH] fix parser',
  '',
  '',
].join('\n');

const BODY = ['diff --git a/a.c b/a.c', '--- a/a.c', '+++ b/a.c', '@@ -1 +1 @@', '-a', '+b'].join('\n');

describe('PatchWriter', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('restores the original header and terminates the last line', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchfix-writer-'));
    const logger = new MemoryLogger();
    const destination = path.join(dir, 'out', '0001.patch');

    const written = await new PatchWriter(logger).write(destination, BODY, parsePatch(HEADER + BODY + '\n'));

    expect(written).toBe(HEADER + BODY + '\n');
    expect(await fs.readFile(destination, 'utf8')).toBe(written);
    expect(logger.messages).toEqual([
      { level: 'warn', message: `Restored the original metadata header in ${destination}` },
    ]);
  });

  it('writes a candidate with the right header as-is', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchfix-writer-'));
    const destination = path.join(dir, '0001.patch');
    const text = HEADER + BODY + '\n';

    expect(await new PatchWriter().write(destination, text, parsePatch(text))).toBe(text);
  });

  it('refuses text without a file entry', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchfix-writer-'));
    const destination = path.join(dir, '0001.patch');

    await expect(
      new PatchWriter().write(destination, 'nothing here\n', parsePatch(BODY + '\n')),
    ).rejects.toBeInstanceOf(MalformedPatchError);
    await expect(fs.access(destination)).rejects.toThrow();
  });
});
