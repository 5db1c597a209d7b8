import { promises as fs } from 'fs';
import * as path from 'path';
import {
  capturePristine,
  parsePatch,
  touchedPaths,
  type ApplicationEngine,
  type WorkingTreeReverter,
} from '@patchfix/repo';
import {
  AppError,
  ApplyConflictError,
  MalformedPatchError,
  UsageError,
  isNodeError,
  type Logger,
  type ParsedPatch,
  type PristineSnapshot,
} from '@patchfix/shared';
import type { PatchWriter } from './patch-writer';
import type { ReconcileOptions, ReconcileResult } from './reconciler';

export interface SeriesPatch {
  /** File name, used for ordering and as the patch label */
  name: string;
  path: string;
  text: string;
}

export type SeriesEntry =
  | {
      name: string;
      status: 'success' | 'no-change';
      attempts: number;
      /** Where the patch was written, when it was */
      outputPath?: string;
      costUsd?: number;
    }
  | { name: string; status: 'failed'; error: AppError }
  | { name: string; status: 'skipped' };

export interface SeriesReport {
  entries: SeriesEntry[];
  succeeded: boolean;
  costUsd?: number;
}

export interface SeriesRunnerDeps {
  reconciler: { reconcile(patchText: string, options: ReconcileOptions): Promise<ReconcileResult> };
  /** Applies each accepted patch so later patches see it */
  engine: ApplicationEngine;
  reverter: WorkingTreeReverter;
  writer: PatchWriter;
  logger: Logger;
}

export interface SeriesOptions {
  repoRoot: string;
  runId: string;
  /** Write corrected patches here instead of over the originals */
  outputDir?: string;
  /** Leave accepted patches applied when the series ends */
  keepApplied?: boolean;
  signal?: AbortSignal;
}

/**
 * Reads one patch file, or every `*.patch` file of a directory sorted by name.
 */
export async function loadSeries(input: string): Promise<SeriesPatch[]> {
  const stat = await fs.stat(input).catch((error: unknown) => {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new UsageError(`No such patch file or directory: ${input}`, { cause: error });
    }
    throw error;
  });

  if (!stat.isDirectory()) {
    return [{ name: path.basename(input), path: input, text: await fs.readFile(input, 'utf8') }];
  }

  const names = (await fs.readdir(input)).filter((n) => n.endsWith('.patch')).sort();
  if (names.length === 0) {
    throw new UsageError(`No .patch files found in ${input}`);
  }
  const patches: SeriesPatch[] = [];
  for (const name of names) {
    const file = path.join(input, name);
    patches.push({ name, path: file, text: await fs.readFile(file, 'utf8') });
  }
  return patches;
}

function parseOrUndefined(text: string): ParsedPatch | undefined {
  try {
    return parsePatch(text);
  } catch (error) {
    // Reported when the patch's turn comes.
    if (error instanceof MalformedPatchError) return undefined;
    throw error;
  }
}

/**
 * Processes a patch series one patch at a time. Each accepted patch is
 * written out and applied so the next one reconciles against it; the first
 * failure stops the series. The tree goes back to its starting state at the
 * end unless `keepApplied` is set.
 */
export class SeriesRunner {
  constructor(private readonly deps: SeriesRunnerDeps) {}

  async run(patches: SeriesPatch[], options: SeriesOptions): Promise<SeriesReport> {
    const { repoRoot } = options;
    const paths = new Set<string>();
    for (const p of patches) {
      const parsed = parseOrUndefined(p.text);
      if (parsed) touchedPaths(parsed).forEach((t) => paths.add(t));
    }
    let baseline: PristineSnapshot = await capturePristine(repoRoot, paths);

    const entries: SeriesEntry[] = [];
    let costUsd: number | undefined;
    let stopped = false;

    try {
      for (const p of patches) {
        if (stopped) {
          entries.push({ name: p.name, status: 'skipped' });
          continue;
        }

        try {
          const result = await this.deps.reconciler.reconcile(p.text, {
            repoRoot,
            patchName: p.name,
            runId: options.runId,
            signal: options.signal,
          });
          if (result.costUsd !== undefined) costUsd = (costUsd ?? 0) + result.costUsd;

          let outputPath: string | undefined;
          if (result.status === 'success' || options.outputDir) {
            outputPath = options.outputDir ? path.join(options.outputDir, p.name) : p.path;
            await this.deps.writer.write(outputPath, result.patchText, parsePatch(p.text));
          }

          const accepted = parsePatch(result.patchText);
          baseline = await capturePristine(repoRoot, touchedPaths(accepted), baseline);
          await this.applyAccepted(repoRoot, accepted);

          entries.push({
            name: p.name,
            status: result.status,
            attempts: result.attempts,
            outputPath,
            costUsd: result.costUsd,
          });
        } catch (error) {
          if (!(error instanceof AppError)) throw error;
          await this.deps.logger.error(error, `${p.name} could not be reconciled`);
          entries.push({ name: p.name, status: 'failed', error });
          stopped = true;
        }
      }
    } finally {
      if (!options.keepApplied) {
        await this.deps.reverter.revert(repoRoot, baseline);
      }
    }

    return { entries, succeeded: !stopped, costUsd };
  }

  private async applyAccepted(repoRoot: string, patch: ParsedPatch): Promise<void> {
    const { outcomes } = await this.deps.engine.run(repoRoot, patch);
    const rejected = [...outcomes].filter(([, o]) => o.kind === 'rejected').map(([p]) => p);
    if (rejected.length > 0) {
      throw new ApplyConflictError(rejected, {
        details: 'accepted patch did not apply when replayed onto the tree',
      });
    }
  }
}
