import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createRepo, hasGit, numberedLines } from '@patchfix/repo/test-utils';
import { run } from '../cli';

const ORIGINAL = [
  'From 0123456789abcdef0123456789abcdef01234567 Mon Sep 17 00:00:00 2001',
  'From: Dev <dev@example.com>',
  'Subject: [PATCH] shout line 3',
  '',
  'diff --git a/a.txt b/a.txt',
  '--- a/a.txt',
  '+++ b/a.txt',
  '@@ -2,3 +2,3 @@',
  ' line 2',
  '-line 3',
  '+LINE 3',
  ' line 4',
  '',
].join('\n');

const CORRECTED_BODY = [
  'diff --git a/a.txt b/a.txt',
  '--- a/a.txt',
  '+++ b/a.txt',
  '@@ -2,3 +2,3 @@',
  ' line 2',
  '-line three',
  '+LINE 3',
  ' line 4',
  '',
].join('\n');

const HEADER = ORIGINAL.slice(0, ORIGINAL.indexOf('diff --git'));
const DRIFTED = numberedLines(6).replace('line 3\n', 'line three\n');

let logSpy: ReturnType<typeof vi.spyOn>;
let tmp: string;

beforeEach(async () => {
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'patchfix-cli-'));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(tmp, { recursive: true, force: true });
});

function jsonOutput(): unknown {
  return JSON.parse(String(logSpy.mock.calls.at(-1)?.[0]));
}

async function writeConfig(repo: string, responses: string[]): Promise<void> {
  // JSON is valid YAML
  const config = {
    providers: { offline: { type: 'fake', model: 'fake-1', responses } },
    generator: { minIntervalMs: 0 },
  };
  await fs.writeFile(path.join(repo, '.patchfix.yaml'), JSON.stringify(config));
}

describe('patchfix fix', () => {
  it('exits 2 when the patch path does not exist', async () => {
    const missing = path.join(tmp, 'missing.patch');

    const code = await run(['node', 'patchfix', '--json', 'fix', missing, '--repo', tmp], { exitCode: 0, env: {} });

    expect(code).toBe(2);
    expect(jsonOutput()).toEqual({
      error: { code: 'UsageError', message: `No such patch file or directory: ${missing}` },
    });
  });

  it('exits 2 for a non-positive attempt budget', async () => {
    const code = await run(
      ['node', 'patchfix', '--json', 'fix', 'p.patch', '--repo', tmp, '--max-attempts', '0'],
      { exitCode: 0, env: {} },
    );

    expect(code).toBe(2);
    expect(jsonOutput()).toEqual({ error: { code: 'UsageError', message: 'Expected a positive integer, got "0"' } });
  });

  describe.skipIf(!hasGit)('against a git checkout', () => {
    let repo: string | undefined;

    afterEach(async () => {
      if (repo) await fs.rm(repo, { recursive: true, force: true });
      repo = undefined;
    });

    it('writes the corrected patch to the output directory and exits 0', async () => {
      repo = await createRepo({ 'a.txt': DRIFTED });
      await writeConfig(repo, ['```diff\n' + CORRECTED_BODY + '```\n']);
      const patchPath = path.join(tmp, '0001-shout.patch');
      await fs.writeFile(patchPath, ORIGINAL);
      const outputDir = path.join(tmp, 'out');

      const code = await run(
        ['node', 'patchfix', '--json', 'fix', patchPath, '--repo', repo, '--output-dir', outputDir],
        { exitCode: 0, env: {}, runId: 'run-1' },
      );

      expect(code).toBe(0);
      expect(jsonOutput()).toMatchObject({
        status: 'SUCCESS',
        runId: 'run-1',
        repoRoot: repo,
        patches: [
          { name: '0001-shout.patch', status: 'success', attempts: 1, outputPath: path.join(outputDir, '0001-shout.patch') },
        ],
      });
      expect(await fs.readFile(path.join(outputDir, '0001-shout.patch'), 'utf8')).toBe(HEADER + CORRECTED_BODY);
      expect(await fs.readFile(patchPath, 'utf8')).toBe(ORIGINAL);
      expect(await fs.readFile(path.join(repo, 'a.txt'), 'utf8')).toBe(DRIFTED);
    });

    it('exits 1 and reports the exhausted budget', async () => {
      repo = await createRepo({ 'a.txt': DRIFTED });
      // no scripted responses: the fake echoes the original patch back
      await writeConfig(repo, []);
      const patchPath = path.join(tmp, '0001-shout.patch');
      await fs.writeFile(patchPath, ORIGINAL);

      const code = await run(
        ['node', 'patchfix', '--json', 'fix', patchPath, '--repo', repo, '--max-attempts', '1'],
        { exitCode: 0, env: {} },
      );

      expect(code).toBe(1);
      expect(jsonOutput()).toMatchObject({
        status: 'FAILURE',
        patches: [
          {
            name: '0001-shout.patch',
            status: 'failed',
            error: { code: 'AttemptsExhausted', message: 'Patch could not be reconciled after 1 attempt(s)' },
          },
        ],
      });
      expect(await fs.readFile(patchPath, 'utf8')).toBe(ORIGINAL);
      expect(await fs.readFile(path.join(repo, 'a.txt'), 'utf8')).toBe(DRIFTED);
    });
  });
});

describe.skipIf(!hasGit)('patchfix inspect', () => {
  let repo: string | undefined;

  afterEach(async () => {
    if (repo) await fs.rm(repo, { recursive: true, force: true });
    repo = undefined;
  });

  it('reports the rejected file and leaves the checkout as it was', async () => {
    repo = await createRepo({ 'a.txt': DRIFTED });
    const patchPath = path.join(tmp, '0001-shout.patch');
    await fs.writeFile(patchPath, ORIGINAL);

    const code = await run(['node', 'patchfix', '--json', 'inspect', patchPath, '--repo', repo], {
      exitCode: 0,
      env: {},
    });

    expect(code).toBe(0);
    expect(jsonOutput()).toMatchObject({
      patch: '0001-shout.patch',
      files: [{ path: 'a.txt', outcome: 'rejected', rejectedHunks: 1 }],
      complexity: { rejectedFiles: 1, failedHunks: 1, score: 2 },
    });
    expect(await fs.readFile(path.join(repo, 'a.txt'), 'utf8')).toBe(DRIFTED);
    await expect(fs.access(path.join(repo, 'a.txt.rej'))).rejects.toThrow();
  });
});
