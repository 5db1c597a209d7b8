import * as path from 'path';
import { MalformedPatchError, type PatchFile } from '@patchfix/shared';

/**
 * Returns a reason when a patch path could reach outside the checkout,
 * otherwise undefined.
 */
export function unsafePathReason(filePath: string): string | undefined {
  if (filePath.includes('\0') || filePath.includes('%00')) {
    return `Null byte in path: ${filePath}`;
  }

  let decoded = filePath;
  for (let i = 0; i < 5; i++) {
    let next: string;
    try {
      next = decodeURIComponent(decoded);
    } catch {
      // Not valid percent-encoding; check the text as written.
      break;
    }
    if (next === decoded) break;
    decoded = next;
  }

  const normalized = decoded.replace(/\\/g, '/');

  const segments = normalized.split('/');
  if (segments.some((part) => part === '..')) {
    return `Path traversal: ${filePath}`;
  }
  if (segments.some((part) => part.toLowerCase() === '.git')) {
    return `Repository metadata path: ${filePath}`;
  }
  if (normalized.startsWith('/') || /^[a-zA-Z]:/.test(normalized)) {
    return `Absolute path: ${filePath}`;
  }
  if (/%(?:2f|5c)/i.test(filePath)) {
    return `Encoded path separator: ${filePath}`;
  }
  return undefined;
}

/**
 * Throws MalformedPatchError when any file entry names a path outside the
 * checkout or inside `.git`.
 */
export function assertPatchPathsSafe(patch: { files: readonly PatchFile[] }): void {
  for (const file of patch.files) {
    for (const p of new Set([file.path, file.oldPath])) {
      const reason = unsafePathReason(p);
      if (reason) throw new MalformedPatchError(reason, { details: { path: p } });
    }
  }
}

/**
 * Joins a patch path onto the checkout root.
 */
export function resolveInRepo(repoRoot: string, filePath: string): string {
  return path.join(repoRoot, filePath);
}
