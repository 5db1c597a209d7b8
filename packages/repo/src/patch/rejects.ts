import { promises as fs } from 'fs';
import { isNodeError, readIfExists } from '@patchfix/shared';
import { resolveInRepo } from './guard';

const REJECT_SUFFIXES = ['.rej', '.orig'] as const;

/**
 * Splits a `.rej` file into one fragment per hunk. The leading
 * `diff a/x b/x (rejected hunks)` line is dropped.
 */
export function splitRejectFragments(rejText: string): string[] {
  const fragments: string[] = [];
  let current: string[] | undefined;

  for (const line of rejText.split('\n')) {
    if (line.startsWith('@@ ')) {
      if (current) fragments.push(trimFragment(current));
      current = [line];
    } else if (current) {
      current.push(line);
    }
  }
  if (current) fragments.push(trimFragment(current));
  return fragments;
}

function trimFragment(lines: string[]): string {
  let end = lines.length;
  while (end > 1 && lines[end - 1] === '') end--;
  return lines.slice(0, end).join('\n');
}

/**
 * Reads `<path>.rej` for every path, then deletes the files so the tree
 * holds nothing the apply facility set aside.
 */
export async function collectRejectFragments(
  repoRoot: string,
  paths: Iterable<string>,
): Promise<Map<string, string[]>> {
  const fragments = new Map<string, string[]>();
  for (const p of paths) {
    const rejPath = resolveInRepo(repoRoot, `${p}.rej`);
    const text = await readIfExists(rejPath);
    if (text === undefined) continue;
    fragments.set(p, splitRejectFragments(text));
    await fs.rm(rejPath, { force: true });
  }
  return fragments;
}

/**
 * Deletes `.rej` and `.orig` leftovers next to the given paths.
 * Returns the relative paths that were removed.
 */
export async function removeApplyArtifacts(
  repoRoot: string,
  paths: Iterable<string>,
): Promise<string[]> {
  const removed: string[] = [];
  for (const p of paths) {
    for (const suffix of REJECT_SUFFIXES) {
      const rel = `${p}${suffix}`;
      try {
        await fs.unlink(resolveInRepo(repoRoot, rel));
        removed.push(rel);
      } catch (error) {
        if (!(isNodeError(error) && error.code === 'ENOENT')) throw error;
      }
    }
  }
  return removed;
}
