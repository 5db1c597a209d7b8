import type { OutcomeMap } from '@patchfix/shared';
import { parseRejectedFragment } from '../context';

export interface ComplexityScore {
  rejectedFiles: number;
  failedHunks: number;
  score: number;
}

/**
 * Size of a rejection: failed hunks plus rejected files.
 */
export function complexityScore(outcomes: OutcomeMap): ComplexityScore {
  let rejectedFiles = 0;
  let failedHunks = 0;
  for (const outcome of outcomes.values()) {
    if (outcome.kind !== 'rejected') continue;
    rejectedFiles++;
    failedHunks += outcome.rejectedFragments.reduce(
      (n, fragment) => n + Math.max(1, parseRejectedFragment(fragment).length),
      0,
    );
  }
  return { rejectedFiles, failedHunks, score: rejectedFiles + failedHunks };
}

/**
 * Failure signal for a rejected candidate: each rejected file with its hunk
 * count and the apply facility's diagnostics for it.
 */
export function rejectionSignal(outcomes: OutcomeMap): string {
  const lines: string[] = [];
  for (const [path, outcome] of outcomes) {
    if (outcome.kind !== 'rejected') continue;
    lines.push(`${path}: ${outcome.rejectedFragments.length} hunk(s) rejected`);
    for (const diagnostic of outcome.diagnostics) lines.push(`  ${diagnostic}`);
    for (const fragment of outcome.rejectedFragments) {
      const header = fragment.split('\n', 1)[0];
      lines.push(`  rejected: ${header}`);
    }
  }
  return lines.join('\n');
}

export function pathsByKind(outcomes: OutcomeMap): { clean: string[]; offset: string[]; rejected: string[] } {
  const clean: string[] = [];
  const offset: string[] = [];
  const rejected: string[] = [];
  for (const [path, outcome] of outcomes) {
    if (outcome.kind === 'applied-clean') clean.push(path);
    else if (outcome.kind === 'applied-with-offset') offset.push(path);
    else rejected.push(path);
  }
  return { clean, offset, rejected };
}
