import { promises as fs } from 'fs';
import {
  PristineReadError,
  isNodeError,
  type PristineEntry,
  type PristineSnapshot,
} from '@patchfix/shared';
import { resolveInRepo } from './guard';

/**
 * Reads the current content of every path. Missing files are recorded as
 * absent. Any other read failure is collected, and PristineReadError lists
 * all of them once every path has been tried.
 */
export async function capturePristine(
  repoRoot: string,
  paths: Iterable<string>,
  base?: PristineSnapshot,
): Promise<PristineSnapshot> {
  const files = new Map<string, PristineEntry>(base?.files ?? []);
  const failures: string[] = [];
  const causes: unknown[] = [];

  for (const p of paths) {
    if (files.has(p)) continue;
    try {
      const content = await fs.readFile(resolveInRepo(repoRoot, p));
      files.set(p, { exists: true, content });
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        files.set(p, { exists: false });
      } else {
        failures.push(p);
        causes.push(error);
      }
    }
  }

  if (failures.length > 0) {
    throw new PristineReadError(failures, { cause: causes[0], details: { count: failures.length } });
  }

  return Object.freeze({
    files,
    capturedAt: base?.capturedAt ?? new Date().toISOString(),
  });
}

/**
 * Paths whose on-disk state differs from the snapshot.
 */
export async function diffAgainstSnapshot(
  repoRoot: string,
  snapshot: PristineSnapshot,
): Promise<string[]> {
  const drifted: string[] = [];
  for (const [p, entry] of snapshot.files) {
    let current: Buffer | undefined;
    try {
      current = await fs.readFile(resolveInRepo(repoRoot, p));
    } catch (error) {
      if (!(isNodeError(error) && error.code === 'ENOENT')) throw error;
    }

    if (entry.exists) {
      if (!current || !current.equals(entry.content)) drifted.push(p);
    } else if (current) {
      drifted.push(p);
    }
  }
  return drifted;
}

/**
 * Pristine content of a path as text, or undefined when the file was absent
 * or never captured.
 */
export function pristineText(snapshot: PristineSnapshot, filePath: string): string | undefined {
  const entry = snapshot.files.get(filePath);
  return entry?.exists ? entry.content.toString('utf8') : undefined;
}
