import type { ParsedPatch } from '@patchfix/shared';
import { parsePatch } from '@patchfix/repo';

export interface PreservedPatch {
  text: string;
  parsed: ParsedPatch;
  /** True when the candidate's header differed and was replaced */
  restored: boolean;
}

/**
 * Puts the original metadata header back in front of the candidate's first
 * file entry, byte-for-byte. Throws MalformedPatchError when the candidate
 * has no file entry.
 */
export function preserveMetadata(original: ParsedPatch, candidateText: string): PreservedPatch {
  const candidate = parsePatch(candidateText);
  const originalHeader = original.metadata.headerText;
  const candidateHeader = candidate.metadata.headerText;

  if (candidateHeader === originalHeader) {
    return { text: candidateText, parsed: candidate, restored: false };
  }

  const text = originalHeader + candidateText.slice(candidateHeader.length);
  return { text, parsed: parsePatch(text), restored: true };
}
