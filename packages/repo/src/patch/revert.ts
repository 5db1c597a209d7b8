import { promises as fs } from 'fs';
import * as path from 'path';
import { pathExists } from 'fs-extra';
import { RevertError, type PristineSnapshot } from '@patchfix/shared';
import { GitService } from '../git';
import { resolveInRepo } from './guard';
import { removeApplyArtifacts } from './rejects';
import { diffAgainstSnapshot } from './snapshot';

export type RevertStrategy = 'snapshot' | 'git';

export interface RevertSummary {
  restoredFiles: number;
  removedFiles: number;
}

export interface WorkingTreeReverterOptions {
  strategy?: RevertStrategy;
  git?: GitService;
}

/**
 * Returns every snapshotted path to its pristine bytes, removes files the
 * snapshot recorded as absent, clears apply leftovers, then re-reads the tree
 * and throws RevertError if anything still differs.
 *
 * The `git` strategy checks tracked paths out from the index and falls back
 * to the snapshot for whatever the index does not hold.
 */
export class WorkingTreeReverter {
  private readonly strategy: RevertStrategy;
  private readonly git?: GitService;

  constructor(options: WorkingTreeReverterOptions = {}) {
    this.strategy = options.strategy ?? 'snapshot';
    this.git = options.git;
  }

  async revert(repoRoot: string, snapshot: PristineSnapshot): Promise<RevertSummary> {
    const present: string[] = [];
    const absent: string[] = [];
    for (const [p, entry] of snapshot.files) {
      (entry.exists ? present : absent).push(p);
    }

    if (this.strategy === 'git') {
      const git = this.git ?? new GitService({ repoRoot });
      await git.checkoutPaths(await git.trackedPaths(present));
      // The index lags behind the snapshot for untracked paths and for
      // changes an earlier patch of the series left in the working tree.
      const stale = new Set(await diffAgainstSnapshot(repoRoot, snapshot));
      await restoreFromSnapshot(repoRoot, snapshot, present.filter((p) => stale.has(p)));
    } else {
      await restoreFromSnapshot(repoRoot, snapshot, present);
    }

    let removedFiles = 0;
    for (const p of absent) {
      const abs = resolveInRepo(repoRoot, p);
      if (await pathExists(abs)) {
        await fs.rm(abs, { force: true });
        removedFiles++;
      }
    }
    removedFiles += (await removeApplyArtifacts(repoRoot, snapshot.files.keys())).length;

    const drifted = await diffAgainstSnapshot(repoRoot, snapshot);
    if (drifted.length > 0) {
      throw new RevertError(drifted);
    }

    return { restoredFiles: present.length, removedFiles };
  }
}

async function restoreFromSnapshot(
  repoRoot: string,
  snapshot: PristineSnapshot,
  paths: string[],
): Promise<void> {
  for (const p of paths) {
    const entry = snapshot.files.get(p);
    if (!entry?.exists) continue;
    const abs = resolveInRepo(repoRoot, p);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, entry.content);
  }
}
