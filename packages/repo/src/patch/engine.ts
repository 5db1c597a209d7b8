import type {
  FileOutcome,
  Logger,
  ParsedPatch,
  PatchFile,
  PristineSnapshot,
} from '@patchfix/shared';
import type { ApplyFacility } from './applier';
import { assertPatchPathsSafe } from './guard';
import { parseApplyOutput, reportIsRejected, type FileApplyReport } from './outcome-parser';
import { collectRejectFragments } from './rejects';
import { capturePristine } from './snapshot';

export interface ApplicationResult {
  /** One outcome per patch file, keyed by path, in patch order */
  outcomes: Map<string, FileOutcome>;
  /** Pristine state of every path the patch touches */
  snapshot: PristineSnapshot;
  exitCode: number;
  /** Raw progress output of the apply facility */
  output: string;
}

export interface ApplicationEngineOptions {
  logger?: Logger;
}

/**
 * Captures pristine content, runs the apply facility in reject mode, and
 * classifies every file as clean, offset or rejected.
 *
 * The working tree is left holding whatever applied. Callers revert it.
 */
export class ApplicationEngine {
  private readonly logger?: Logger;

  constructor(
    private readonly facility: ApplyFacility,
    options: ApplicationEngineOptions = {},
  ) {
    this.logger = options.logger;
  }

  /**
   * @param snapshot - Snapshot from an earlier run on the same checkout.
   *   Paths it already holds are not re-read; new paths are read from the
   *   tree, which must be pristine at this point.
   */
  async run(
    repoRoot: string,
    patch: ParsedPatch,
    snapshot?: PristineSnapshot,
  ): Promise<ApplicationResult> {
    assertPatchPathsSafe(patch);

    // Capture must finish before the facility touches anything.
    const pristine = await capturePristine(repoRoot, touchedPaths(patch), snapshot);

    const invocation = await this.facility.apply(repoRoot, patch.text);
    const report = parseApplyOutput(invocation.output);
    const rejects = await collectRejectFragments(
      repoRoot,
      patch.files.map((f) => f.path),
    );

    const outcomes = new Map<string, FileOutcome>();
    for (const file of patch.files) {
      const fileReport = report.files.get(file.path) ?? report.files.get(file.oldPath);
      const fragments = rejects.get(file.path);
      const aborted = invocation.exitCode !== 0 && !report.wrotePhaseSeen;
      const unreported = invocation.exitCode !== 0 && fileReport === undefined;

      if (
        fragments !== undefined ||
        aborted ||
        unreported ||
        (fileReport !== undefined && reportIsRejected(fileReport))
      ) {
        outcomes.set(file.path, {
          kind: 'rejected',
          rejectedFragments: fragments ?? fallbackFragments(file, fileReport),
          diagnostics: diagnosticsFor(fileReport, report.unattributed),
          hunkOffsets: fileReport?.hunkOffsets ?? [],
        });
        continue;
      }

      const offsets = fileReport?.hunkOffsets ?? [];
      const firstShift = offsets.find((o) => o.offsetLines !== 0);
      if (firstShift) {
        outcomes.set(file.path, {
          kind: 'applied-with-offset',
          offsetLines: firstShift.offsetLines,
          hunkOffsets: offsets,
        });
      } else {
        outcomes.set(file.path, { kind: 'applied-clean' });
      }
    }

    await this.logger?.debug(
      `git apply exited ${invocation.exitCode}: ${summarize(outcomes)}`,
    );

    return {
      outcomes,
      snapshot: pristine,
      exitCode: invocation.exitCode,
      output: invocation.output,
    };
  }
}

/**
 * Every path the patch reads or writes, old and new sides of renames included.
 */
export function touchedPaths(patch: ParsedPatch): string[] {
  const paths = new Set<string>();
  for (const file of patch.files) {
    paths.add(file.oldPath);
    paths.add(file.path);
  }
  return [...paths];
}

function fallbackFragments(file: PatchFile, report: FileApplyReport | undefined): string[] {
  const numbered = (report?.rejectedHunks ?? [])
    .map((n) => file.hunks[n - 1])
    .filter((h) => h !== undefined);
  const hunks = numbered.length > 0 ? numbered : file.hunks;
  return hunks.map((h) => h.text);
}

function diagnosticsFor(report: FileApplyReport | undefined, unattributed: string[]): string[] {
  if (report && report.diagnostics.length > 0) return [...report.diagnostics];
  return [...unattributed];
}

export function summarize(outcomes: ReadonlyMap<string, FileOutcome>): string {
  const counts = { 'applied-clean': 0, 'applied-with-offset': 0, rejected: 0 };
  for (const outcome of outcomes.values()) counts[outcome.kind]++;
  return `${counts['applied-clean']} clean, ${counts['applied-with-offset']} offset, ${counts.rejected} rejected`;
}
