import type { HunkOffset } from '@patchfix/shared';

/**
 * What the apply facility said about one file.
 */
export interface FileApplyReport {
  path: string;
  hunkOffsets: HunkOffset[];
  appliedHunks: number[];
  rejectedHunks: number[];
  /** Reject count announced by "Applying patch X with N rejects..." */
  announcedRejects: number;
  /** A check-phase error was reported for this file */
  failed: boolean;
  /** "Applied patch X cleanly." was seen */
  appliedCleanly: boolean;
  diagnostics: string[];
}

export interface ApplyOutputReport {
  files: Map<string, FileApplyReport>;
  /** True once any write-phase line ("Applied patch", "Applying patch") is seen */
  wrotePhaseSeen: boolean;
  /** `error:` lines that could not be tied to a file */
  unattributed: string[];
}

const CHECKING_RE = /^Checking patch (.+)\.\.\.$/;
const OFFSET_RE = /^Hunk #(\d+) succeeded at (\d+) \(offset (-?\d+) lines?\)\.$/;
const HUNK_APPLIED_RE = /^Hunk #(\d+) applied cleanly\.$/;
const HUNK_REJECTED_RE = /^Rejected hunk #(\d+)\.$/;
const APPLIED_CLEANLY_RE = /^Applied patch (.+) cleanly\.$/;
const APPLYING_WITH_REJECTS_RE = /^Applying patch (.+) with (\d+) rejects?\.\.\.$/;
const PATCH_FAILED_RE = /^error: patch failed: (.+):(\d+)$/;
const SEARCHING_RE = /^error: while searching for:$/;
const FILE_ERROR_RE =
  /^error: (.+?): (does not exist in index|No such file or directory|already exists in working directory|already exists in index|patch does not apply|does not match index|wrong type)$/;
const ANY_ERROR_RE = /^error: /;

/**
 * Parses the progress stream of `git apply --reject --verbose`.
 *
 * Git checks every file before writing any of them, so the messages for a
 * file are split between a check phase and a write phase and are generally
 * not adjacent to the line that introduced the file. The parser tracks the
 * file currently under consideration line by line.
 */
export function parseApplyOutput(output: string): ApplyOutputReport {
  const files = new Map<string, FileApplyReport>();
  const unattributed: string[] = [];
  let wrotePhaseSeen = false;
  let current: FileApplyReport | undefined;
  let searchBuffer: string[] | undefined;

  const reportFor = (path: string): FileApplyReport => {
    let report = files.get(path);
    if (!report) {
      report = {
        path,
        hunkOffsets: [],
        appliedHunks: [],
        rejectedHunks: [],
        announcedRejects: 0,
        failed: false,
        appliedCleanly: false,
        diagnostics: [],
      };
      files.set(path, report);
    }
    return report;
  };

  for (const rawLine of output.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    let m: RegExpExecArray | null;

    if ((m = PATCH_FAILED_RE.exec(line))) {
      const report = reportFor(m[1]);
      report.failed = true;
      report.diagnostics.push(line);
      if (searchBuffer && searchBuffer.length > 0) {
        report.diagnostics.push(`while searching for:\n${searchBuffer.join('\n')}`);
      }
      searchBuffer = undefined;
      current = report;
      continue;
    }

    if (searchBuffer !== undefined && !isProgressLine(line)) {
      searchBuffer.push(line);
      continue;
    }
    searchBuffer = undefined;

    if (SEARCHING_RE.test(line)) {
      searchBuffer = [];
      continue;
    }

    if ((m = CHECKING_RE.exec(line))) {
      current = reportFor(m[1]);
      continue;
    }

    if ((m = APPLIED_CLEANLY_RE.exec(line))) {
      wrotePhaseSeen = true;
      current = reportFor(m[1]);
      current.appliedCleanly = true;
      continue;
    }

    if ((m = APPLYING_WITH_REJECTS_RE.exec(line))) {
      wrotePhaseSeen = true;
      current = reportFor(m[1]);
      current.announcedRejects = Number(m[2]);
      continue;
    }

    if ((m = OFFSET_RE.exec(line))) {
      if (current) {
        const hunk = Number(m[1]);
        if (!current.hunkOffsets.some((o) => o.hunk === hunk)) {
          current.hunkOffsets.push({ hunk, offsetLines: Number(m[3]) });
        }
      }
      continue;
    }

    if ((m = HUNK_APPLIED_RE.exec(line))) {
      current?.appliedHunks.push(Number(m[1]));
      continue;
    }

    if ((m = HUNK_REJECTED_RE.exec(line))) {
      current?.rejectedHunks.push(Number(m[1]));
      continue;
    }

    if ((m = FILE_ERROR_RE.exec(line))) {
      const report = reportFor(m[1]);
      report.failed = true;
      report.diagnostics.push(line);
      continue;
    }

    if (ANY_ERROR_RE.test(line)) {
      if (current) current.diagnostics.push(line);
      else unattributed.push(line);
    }
  }

  return { files, wrotePhaseSeen, unattributed };
}

function isProgressLine(line: string): boolean {
  return (
    CHECKING_RE.test(line) ||
    APPLIED_CLEANLY_RE.test(line) ||
    APPLYING_WITH_REJECTS_RE.test(line) ||
    HUNK_APPLIED_RE.test(line) ||
    HUNK_REJECTED_RE.test(line) ||
    OFFSET_RE.test(line) ||
    ANY_ERROR_RE.test(line)
  );
}

/**
 * Whether any line of the report describes a rejection.
 */
export function reportIsRejected(report: FileApplyReport): boolean {
  return report.failed || report.rejectedHunks.length > 0 || report.announcedRejects > 0;
}
