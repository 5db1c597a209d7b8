import {
  capturePristine,
  parsePatch,
  summarize,
  touchedPaths,
  type ApplicationEngine,
  type ApplicationResult,
  type WorkingTreeReverter,
} from '@patchfix/repo';
import {
  AttemptsExhaustedError,
  ComplexityExceededError,
  FixGenerationError,
  MalformedPatchError,
  PatchOpError,
  type AttemptResult,
  type Logger,
  type OutcomeMap,
  type ParsedPatch,
  type PatchContext,
  type PristineSnapshot,
  type ReconcileConfig,
  type ReconcileFinished,
} from '@patchfix/shared';
import type { ContextBuilder } from '../context';
import type { FixCandidate, FixGenerator } from '../generator';
import type { Validator } from '../validate';
import { complexityScore, pathsByKind, rejectionSignal } from './complexity';
import { TreeState } from './tree-state';

export interface ReconcilerDeps {
  engine: ApplicationEngine;
  reverter: WorkingTreeReverter;
  contextBuilder: ContextBuilder;
  generator: FixGenerator;
  validator: Validator;
  logger: Logger;
  config: Pick<ReconcileConfig, 'maxAttempts' | 'complexityThreshold'>;
  now?: () => number;
}

export interface ReconcileOptions {
  repoRoot: string;
  /** Label used in events and messages, usually the patch file name */
  patchName: string;
  runId: string;
  signal?: AbortSignal;
}

export interface ReconcileResult {
  status: 'success' | 'no-change';
  patchName: string;
  /** Corrected patch; the original text when it already applied */
  patchText: string;
  /** Candidates requested from the fix generator */
  attempts: number;
  /** Outcomes of the original patch against the pristine tree */
  initialOutcomes: OutcomeMap;
  finalAttempt?: AttemptResult;
  costUsd?: number;
  durationMs: number;
}

type FinishStatus = ReconcileFinished['payload']['status'];

/**
 * Per-patch state. The snapshot only grows: candidates may touch paths the
 * original did not.
 */
interface Run {
  options: ReconcileOptions;
  patch: ParsedPatch;
  logger: Logger;
  tree: TreeState;
  snapshot?: PristineSnapshot;
  attempts: number;
  costUsd?: number;
  startedAt: number;
  finished: boolean;
}

/**
 * Drives one patch from its first application to an accepted candidate or
 * an exhausted attempt budget.
 *
 * The working tree is reverted and verified before every context build and
 * every candidate apply. Each attempt starts from a context built from
 * scratch; the only thing carried forward is the last failure signal.
 */
export class Reconciler {
  private readonly now: () => number;

  constructor(private readonly deps: ReconcilerDeps) {
    this.now = deps.now ?? Date.now;
  }

  async reconcile(patchText: string, options: ReconcileOptions): Promise<ReconcileResult> {
    // Malformed input fails here, before anything touches the tree.
    const patch = parsePatch(patchText);
    const run: Run = {
      options,
      patch,
      logger: this.deps.logger.child({ patch: options.patchName }),
      tree: new TreeState(),
      attempts: 0,
      startedAt: this.now(),
      finished: false,
    };

    await run.logger.trace(
      {
        type: 'ReconcileStarted',
        ...this.base(run),
        payload: {
          patchName: options.patchName,
          fileCount: patch.files.length,
          maxAttempts: this.deps.config.maxAttempts,
        },
      },
      `Reconciling ${options.patchName} (${patch.files.length} file(s))`,
    );

    try {
      return await this.drive(run);
    } catch (error) {
      try {
        if (run.tree.isDirty) await this.revert(run, 'abandoning patch after a fatal error');
      } finally {
        if (!run.finished) await this.finish(run, 'failed');
      }
      throw error;
    }
  }

  private async drive(run: Run): Promise<ReconcileResult> {
    const { patch, options } = run;
    const { maxAttempts, complexityThreshold } = this.deps.config;

    run.snapshot = await capturePristine(options.repoRoot, touchedPaths(patch));
    const initial = await this.apply(run, 0, patch);

    // Offset hunks still apply; only a rejection needs a new candidate.
    if (pathsByKind(initial.outcomes).rejected.length === 0) {
      await this.revert(run, 'original patch applies');
      await this.finish(run, 'no-change');
      return this.result(run, 'no-change', patch.text, initial.outcomes);
    }

    const complexity = complexityScore(initial.outcomes);
    if (complexity.score > complexityThreshold) {
      await this.revert(run, 'rejection too complex to reconcile');
      await this.finish(run, 'complexity-exceeded');
      throw new ComplexityExceededError(complexity.score, complexityThreshold, {
        details: { rejectedFiles: complexity.rejectedFiles, failedHunks: complexity.failedHunks },
      });
    }

    await this.revert(run, 'resetting before the first context build');

    let evaluated = patch;
    let outcomes: OutcomeMap = initial.outcomes;
    let lastFailureSignal: string | undefined;
    let lastCandidate: string | undefined;
    let context = await this.buildContext(run, 1, evaluated, outcomes, undefined);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      run.attempts = attempt;
      run.tree.assertPristine('request a candidate');

      await run.logger.log({
        type: 'CandidateRequested',
        ...this.base(run),
        payload: { attempt, maxTokens: this.deps.generator.budgetFor?.(patch) },
      });

      let candidate: FixCandidate;
      let candidatePatch: ParsedPatch;
      try {
        candidate = await this.deps.generator.generate(context, options.signal);
        candidatePatch = parsePatch(candidate.patchText);
      } catch (error) {
        if (!(error instanceof FixGenerationError || error instanceof MalformedPatchError)) throw error;
        lastFailureSignal = `Candidate generation failed: ${error.message}`;
        await this.attemptFinished(run, attempt, 'generation-failed');
        if (attempt < maxAttempts) {
          context = await this.buildContext(run, attempt + 1, evaluated, outcomes, lastFailureSignal);
        }
        continue;
      }

      if (candidate.costUsd !== undefined) {
        run.costUsd = (run.costUsd ?? 0) + candidate.costUsd;
      }
      lastCandidate = candidate.patchText;

      const applied = await this.apply(run, attempt, candidatePatch);
      const { rejected } = pathsByKind(applied.outcomes);
      await run.logger.log({
        type: 'CandidateApplied',
        ...this.base(run),
        payload: { attempt, clean: rejected.length === 0, rejected },
      });

      if (rejected.length > 0) {
        lastFailureSignal = rejectionSignal(applied.outcomes);
        await this.revert(run, `candidate ${attempt} rejected`);
        await this.attemptFinished(run, attempt, 'rejected');
      } else {
        const verdict = await this.deps.validator.validate({
          repoRoot: options.repoRoot,
          original: patch,
          candidate: candidatePatch,
          signal: options.signal,
        });
        await run.logger.log({
          type: 'ValidationFinished',
          ...this.base(run),
          payload: {
            attempt,
            passed: verdict.passed,
            validator: verdict.validator,
            diagnostic: verdict.diagnostic,
          },
        });
        await this.revert(run, verdict.passed ? 'candidate accepted' : `candidate ${attempt} failed validation`);

        if (verdict.passed) {
          await this.attemptFinished(run, attempt, 'success');
          await this.finish(run, 'success');
          return this.result(run, 'success', candidate.patchText, initial.outcomes, {
            attempt,
            outcome: 'success',
            candidatePatch: candidate.patchText,
          });
        }

        lastFailureSignal = verdict.diagnostic ?? `Validation failed (${verdict.validator})`;
        await this.attemptFinished(run, attempt, 'validation-failed');
      }

      evaluated = candidatePatch;
      outcomes = applied.outcomes;
      if (attempt < maxAttempts) {
        context = await this.buildContext(run, attempt + 1, evaluated, outcomes, lastFailureSignal);
      }
    }

    await this.finish(run, 'exhausted');
    throw new AttemptsExhaustedError(maxAttempts, { lastFailureSignal, lastCandidate });
  }

  private async apply(run: Run, attempt: number, patch: ParsedPatch): Promise<ApplicationResult> {
    run.tree.assertPristine(attempt === 0 ? 'apply the original patch' : `apply candidate ${attempt}`);
    run.tree.markDirty();
    const result = await this.deps.engine.run(run.options.repoRoot, patch, run.snapshot);
    run.snapshot = result.snapshot;

    await run.logger.trace(
      {
        type: 'PatchApplyAttempted',
        ...this.base(run),
        payload: { attempt, ...pathsByKind(result.outcomes) },
      },
      `${attempt === 0 ? 'Original patch' : `Candidate ${attempt}`}: ${summarize(result.outcomes)}`,
    );
    return result;
  }

  private async revert(run: Run, reason: string): Promise<void> {
    if (!run.snapshot) return;
    const summary = await this.deps.reverter.revert(run.options.repoRoot, run.snapshot);
    run.tree.markPristine();
    await run.logger.log({
      type: 'RollbackPerformed',
      ...this.base(run),
      payload: { reason, ...summary },
    });
  }

  private async buildContext(
    run: Run,
    attempt: number,
    evaluatedPatch: ParsedPatch,
    outcomes: OutcomeMap,
    lastFailureSignal: string | undefined,
  ): Promise<PatchContext> {
    run.tree.assertPristine('build context');
    if (!run.snapshot) {
      throw new PatchOpError('Context requested before the pristine snapshot was captured');
    }

    const context = this.deps.contextBuilder.build({
      attempt,
      patch: run.patch,
      evaluatedPatch,
      outcomes,
      snapshot: run.snapshot,
      lastFailureSignal,
    });
    await run.logger.log({
      type: 'ContextBuilt',
      ...this.base(run),
      payload: {
        attempt,
        fileCount: context.files.length,
        rejectedHunkCount: context.files.reduce((n, f) => n + f.comparisons.length, 0),
        hasFailureSignal: lastFailureSignal !== undefined,
      },
    });
    return context;
  }

  private async attemptFinished(
    run: Run,
    attempt: number,
    outcome: AttemptResult['outcome'],
  ): Promise<void> {
    await run.logger.trace(
      { type: 'AttemptFinished', ...this.base(run), payload: { attempt, outcome } },
      `Attempt ${attempt}/${this.deps.config.maxAttempts}: ${outcome}`,
    );
  }

  private async finish(run: Run, status: FinishStatus): Promise<void> {
    run.finished = true;
    await run.logger.trace(
      {
        type: 'ReconcileFinished',
        ...this.base(run),
        payload: {
          status,
          attempts: run.attempts,
          durationMs: this.now() - run.startedAt,
          costUsd: run.costUsd,
        },
      },
      `${run.options.patchName}: ${status}`,
    );
  }

  private result(
    run: Run,
    status: ReconcileResult['status'],
    patchText: string,
    initialOutcomes: OutcomeMap,
    finalAttempt?: AttemptResult,
  ): ReconcileResult {
    return {
      status,
      patchName: run.options.patchName,
      patchText,
      attempts: run.attempts,
      initialOutcomes,
      finalAttempt,
      costUsd: run.costUsd,
      durationMs: this.now() - run.startedAt,
    };
  }

  private base(run: Run) {
    return {
      schemaVersion: 1,
      timestamp: new Date(this.now()).toISOString(),
      runId: run.options.runId,
    };
  }
}
