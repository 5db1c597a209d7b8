/**
 * Target line range of one hunk, in new-file numbering.
 * `end` is `start + count` as written in the hunk header.
 */
export interface LineRange {
  start: number;
  end: number;
}

/**
 * One `@@` hunk, kept as replayable text.
 */
export interface Hunk {
  /** The `@@ -a,b +c,d @@ ...` line */
  header: string;
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  /** Body lines including their ` `, `-`, `+` or `\` prefix */
  lines: string[];
  /** Header and body joined with `\n` */
  text: string;
}

/**
 * One file entry of a unified diff.
 */
export interface PatchFile {
  /** Path after the change (`b/` side); the old path for deletions */
  path: string;
  /** Path before the change (`a/` side) */
  oldPath: string;
  isNew: boolean;
  isDeleted: boolean;
  /** Binary entries carry no textual hunks */
  isBinary: boolean;
  lineRanges: LineRange[];
  hunks: Hunk[];
  /** Every line of this file entry, from its boundary line to the next one */
  rawText: string;
}

/**
 * Mail-style header that precedes the first file boundary.
 * `headerText` is byte-exact and is what gets written back.
 */
export interface PatchMetadata {
  /** The mbox `From <sha> <date>` separator line */
  fromLine?: string;
  author?: string;
  date?: string;
  /** Full subject, continuation lines joined with `\n` */
  subject?: string;
  headerText: string;
}

export interface ParsedPatch {
  metadata: PatchMetadata;
  files: PatchFile[];
  /** The text the patch was parsed from */
  text: string;
}

/**
 * Offset reported for one hunk that applied away from its header position.
 */
export interface HunkOffset {
  /** 1-based hunk number as reported by the apply facility */
  hunk: number;
  offsetLines: number;
}

/**
 * Result of one application attempt for one file.
 * A file is exactly one of these; rejection wins over offset.
 */
export type FileOutcome =
  | { kind: 'applied-clean' }
  | { kind: 'applied-with-offset'; offsetLines: number; hunkOffsets: HunkOffset[] }
  | {
      kind: 'rejected';
      /** Raw text of every rejected hunk, `@@` header included */
      rejectedFragments: string[];
      /** `error:` lines the apply facility printed for this file */
      diagnostics: string[];
      hunkOffsets: HunkOffset[];
    };

export type FileOutcomeKind = FileOutcome['kind'];

export type OutcomeMap = ReadonlyMap<string, FileOutcome>;

export type PristineEntry = { exists: true; content: Buffer } | { exists: false };

/**
 * Target-file contents captured before any apply. Never mutated; a new
 * snapshot replaces it only after a verified revert.
 */
export interface PristineSnapshot {
  readonly files: ReadonlyMap<string, PristineEntry>;
  readonly capturedAt: string;
}
