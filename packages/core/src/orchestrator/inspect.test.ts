import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ApplicationEngine, WorkingTreeReverter, type ApplyFacility, type ApplyInvocation } from '@patchfix/repo';
import { ContextBuilder } from '../context';
import { inspectPatch } from './inspect';

const PATCH = ['diff --git a/a.c b/a.c', '--- a/a.c', '+++ b/a.c', '@@ -1,2 +1,2 @@', ' one', '-two', '+TWO', ''].join(
  '\n',
);

/** Half-applies the patch: writes a.c and a reject file, then reports failure. */
class RejectingFacility implements ApplyFacility {
  async apply(repoRoot: string): Promise<ApplyInvocation> {
    await fs.writeFile(path.join(repoRoot, 'a.c'), 'scribbled\n');
    await fs.writeFile(
      path.join(repoRoot, 'a.c.rej'),
      'diff a/a.c b/a.c\t(rejected hunks)\n@@ -1,2 +1,2 @@\n one\n-two\n+TWO\n',
    );
    return {
      exitCode: 1,
      output: 'Checking patch a.c...\nerror: patch failed: a.c:1\nApplying patch a.c with 1 reject...\nRejected hunk #1.',
    };
  }
}

describe('inspectPatch', () => {
  let repo: string | undefined;

  afterEach(async () => {
    if (repo) await fs.rm(repo, { recursive: true, force: true });
    repo = undefined;
  });

  it('reports outcomes and the first-attempt context and leaves the tree as found', async () => {
    repo = await fs.mkdtemp(path.join(os.tmpdir(), 'patchfix-inspect-'));
    await fs.writeFile(path.join(repo, 'a.c'), 'one\nthree\n');

    const report = await inspectPatch(
      {
        engine: new ApplicationEngine(new RejectingFacility()),
        reverter: new WorkingTreeReverter(),
        contextBuilder: new ContextBuilder({ excerptRadius: 10, cleanExcerptRadius: 3, searchRadius: 200 }),
      },
      repo,
      PATCH,
    );

    expect(report.outcomes.get('a.c')?.kind).toBe('rejected');
    expect(report.complexity).toEqual({ rejectedFiles: 1, failedHunks: 1, score: 2 });
    expect(report.context.attempt).toBe(1);
    expect(report.context.files.map((f) => f.path)).toEqual(['a.c']);
    expect(report.output).toContain('Rejected hunk #1.');
    expect(await fs.readFile(path.join(repo, 'a.c'), 'utf8')).toBe('one\nthree\n');
    await expect(fs.access(path.join(repo, 'a.c.rej'))).rejects.toThrow();
  });
});
