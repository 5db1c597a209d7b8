import type {
  ExpectedVsActual,
  FileContext,
  FileOutcome,
  OutcomeMap,
  ParsedPatch,
  PatchContext,
  PatchFile,
  PristineSnapshot,
} from '@patchfix/shared';
import { pristineText, splitLines } from '@patchfix/repo';
import { compareExpectedActual } from './compare';
import { parseRejectedFragment } from './fragment';
import { locateBestMatch } from './match';
import { mergeWindows, windowBounds, windowExcerpt, type LineWindow } from './window';

export const REJECTED_NOTE =
  'one or more hunks could not be applied; compare what each hunk expected with what the file holds now';
export const OFFSET_NOTE =
  'applied successfully but at a different position than the patch expected; must still be included in any regenerated patch with corrected line numbers';
export const CLEAN_NOTE = "applied cleanly; leave this file's change as-is";

export interface ContextBuilderOptions {
  /** Lines on each side of rejected and offset hunks */
  excerptRadius: number;
  /** Lines on each side of cleanly applied hunks */
  cleanExcerptRadius: number;
  /** How far from the expected line to look for a rejected hunk's context */
  searchRadius: number;
}

export interface BuildContextInput {
  attempt: number;
  patch: ParsedPatch;
  /** Patch whose application produced `outcomes`; defaults to `patch` */
  evaluatedPatch?: ParsedPatch;
  outcomes: OutcomeMap;
  snapshot: PristineSnapshot;
  lastFailureSignal?: string;
}

/**
 * Turns one pass of outcomes into a fresh PatchContext. Reads only the
 * pristine snapshot, never the working tree.
 */
export class ContextBuilder {
  constructor(private readonly options: ContextBuilderOptions) {}

  build(input: BuildContextInput): PatchContext {
    const evaluated = input.evaluatedPatch ?? input.patch;
    const files: FileContext[] = [];

    for (const file of evaluated.files) {
      const outcome = input.outcomes.get(file.path);
      if (!outcome) continue;
      const text = pristineText(input.snapshot, file.isNew ? file.path : file.oldPath);
      const lines = text === undefined ? undefined : splitLines(text);
      files.push(this.fileContext(file, outcome, lines));
    }

    return {
      attempt: input.attempt,
      patch: input.patch,
      evaluatedPatch: evaluated,
      files,
      lastFailureSignal: input.lastFailureSignal,
    };
  }

  private fileContext(
    file: PatchFile,
    outcome: FileOutcome,
    lines: string[] | undefined,
  ): FileContext {
    const base = { path: file.path, outcome };
    const readable = lines !== undefined && !file.isBinary;

    switch (outcome.kind) {
      case 'rejected': {
        const comparisons = this.compareRejected(file, outcome.rejectedFragments, lines);
        const windows = readable
          ? comparisons.map((c) =>
              windowBounds(
                lines.length,
                Math.max(0, c.actualStartLine - 1),
                this.options.excerptRadius,
                c.expected.length,
              ),
            )
          : [];
        return {
          ...base,
          note: REJECTED_NOTE,
          comparisons,
          excerpts: readable ? this.excerpts(file.path, outcome.kind, lines, windows) : [],
        };
      }

      case 'applied-with-offset': {
        const windows = readable
          ? file.hunks.map((h, i) => {
              const shift = outcome.hunkOffsets.find((o) => o.hunk === i + 1)?.offsetLines ?? 0;
              return windowBounds(
                lines.length,
                Math.max(0, h.oldStart - 1 + shift),
                this.options.excerptRadius,
                h.oldCount,
              );
            })
          : [];
        return {
          ...base,
          note: OFFSET_NOTE,
          comparisons: [],
          excerpts: readable ? this.excerpts(file.path, outcome.kind, lines, windows) : [],
        };
      }

      case 'applied-clean': {
        const windows = readable
          ? file.hunks.map((h) =>
              windowBounds(
                lines.length,
                Math.max(0, h.oldStart - 1),
                this.options.cleanExcerptRadius,
                h.oldCount,
              ),
            )
          : [];
        return {
          ...base,
          note: CLEAN_NOTE,
          comparisons: [],
          excerpts: readable ? this.excerpts(file.path, outcome.kind, lines, windows) : [],
        };
      }
    }
  }

  private compareRejected(
    file: PatchFile,
    fragments: readonly string[],
    lines: string[] | undefined,
  ): ExpectedVsActual[] {
    const comparisons: ExpectedVsActual[] = [];
    for (const fragment of fragments) {
      for (const hunk of parseRejectedFragment(fragment)) {
        const hint = Math.max(0, hunk.oldStart - 1);
        const start =
          lines === undefined
            ? hint
            : locateBestMatch(hunk.expected, lines, hint, this.options.searchRadius).start;
        comparisons.push(
          compareExpectedActual({
            filePath: file.path,
            hunkIndex: comparisons.length,
            expectedLine: hunk.oldStart,
            expected: hunk.expected,
            lines,
            start,
          }),
        );
      }
    }
    return comparisons;
  }

  private excerpts(
    filePath: string,
    status: FileOutcome['kind'],
    lines: string[],
    windows: LineWindow[],
  ) {
    return mergeWindows(windows).map((w) => windowExcerpt(filePath, status, lines, w));
  }
}
