import type { FileOutcome, FileOutcomeKind, ParsedPatch } from './patch';

export type DifferenceKind = 'line-count' | 'blank-line' | 'whitespace' | 'content' | 'missing';

/**
 * One labeled divergence between what a hunk expected and what the file holds.
 */
export interface Difference {
  kind: DifferenceKind;
  /** 1-based line in the actual file, when the difference is line-specific */
  line?: number;
  expected?: string;
  actual?: string;
  message: string;
}

/**
 * Comparison of one rejected hunk against the pristine file.
 */
export interface ExpectedVsActual {
  filePath: string;
  /** 0-based index of the hunk within the rejected fragments of this file */
  hunkIndex: number;
  /** Line the hunk header pointed at (1-based, old-file numbering) */
  expectedLine: number;
  /** Line where the closest match starts in the actual file (1-based) */
  actualStartLine: number;
  expected: string[];
  actual: string[];
  differences: Difference[];
}

/**
 * A window of pristine file content. `startLine` and `endLine` are 1-based
 * and inclusive; `lines` holds exactly `endLine - startLine + 1` entries.
 */
export interface FileExcerpt {
  filePath: string;
  status: FileOutcomeKind;
  startLine: number;
  endLine: number;
  lines: string[];
}

export interface FileContext {
  path: string;
  outcome: FileOutcome;
  /** Fixed instruction for this file, derived from its outcome */
  note: string;
  excerpts: FileExcerpt[];
  comparisons: ExpectedVsActual[];
}

/**
 * Everything the fix generator sees for one attempt. Rebuilt from scratch
 * for every attempt; the previous attempt survives only as
 * `lastFailureSignal`.
 */
export interface PatchContext {
  attempt: number;
  /** The patch being reconciled, as the user supplied it */
  patch: ParsedPatch;
  /**
   * The patch whose application produced `files`: the original on the
   * first attempt, the latest candidate afterwards.
   */
  evaluatedPatch: ParsedPatch;
  files: FileContext[];
  lastFailureSignal?: string;
}

export type AttemptOutcome = 'success' | 'rejected' | 'validation-failed' | 'generation-failed';

export interface AttemptResult {
  attempt: number;
  outcome: AttemptOutcome;
  candidatePatch?: string;
  failureSignal?: string;
}
