import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from 'path';
import { atomicWrite, isNodeError, readIfExists } from './io';

describe('fs io', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it('atomicWrite creates parent directories and leaves no temp files', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'patchfix-io-'));
    const target = join(tmpDir, 'nested', 'out.patch');

    await atomicWrite(target, 'diff --git a/x b/x\n');

    expect(await fs.readFile(target, 'utf8')).toBe('diff --git a/x b/x\n');
    expect(await fs.readdir(join(tmpDir, 'nested'))).toEqual(['out.patch']);
  });

  it('readIfExists maps ENOENT to undefined', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'patchfix-io-'));
    expect(await readIfExists(join(tmpDir, 'missing.c'))).toBeUndefined();
  });

  it('readIfExists rethrows other errors', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'patchfix-io-'));
    await expect(readIfExists(tmpDir)).rejects.toMatchObject({ code: 'EISDIR' });
  });

  it('isNodeError narrows errors carrying a code', () => {
    const error = Object.assign(new Error('x'), { code: 'EACCES' });
    expect(isNodeError(error)).toBe(true);
    expect(isNodeError(new Error('plain'))).toBe(false);
    expect(isNodeError('EACCES')).toBe(false);
  });
});
