import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { UsageError } from '@patchfix/shared';
import { findRepoRoot } from './find-root';

describe('findRepoRoot', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchfix-root-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('finds the nearest parent holding .git', async () => {
    const root = path.join(tmpDir, 'checkout');
    await fs.mkdir(path.join(root, '.git'), { recursive: true });
    const subdir = path.join(root, 'src', 'lib');
    await fs.mkdir(subdir, { recursive: true });

    expect(await findRepoRoot(subdir)).toBe(root);
  });

  it('accepts a .git file as used by worktrees', async () => {
    const root = path.join(tmpDir, 'worktree');
    await fs.mkdir(root, { recursive: true });
    await fs.writeFile(path.join(root, '.git'), 'gitdir: /elsewhere\n');

    expect(await findRepoRoot(root)).toBe(root);
  });

  it('throws UsageError outside any checkout', async () => {
    // tmpdir itself is not expected to be inside a checkout
    await expect(findRepoRoot(tmpDir)).rejects.toBeInstanceOf(UsageError);
  });
});
