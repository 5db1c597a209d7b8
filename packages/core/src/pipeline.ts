import {
  ApplicationEngine,
  GitApplyFacility,
  GitService,
  WorkingTreeReverter,
  type ApplyFacility,
} from '@patchfix/repo';
import type { ProviderAdapter } from '@patchfix/adapters';
import type { Config, Logger } from '@patchfix/shared';
import { ContextBuilder } from './context';
import { CostTracker } from './cost/tracker';
import { ProviderFixGenerator, type FixGenerator } from './generator';
import { Reconciler, SeriesRunner, PatchWriter } from './orchestrator';
import { IntervalGate } from './rate/interval-gate';
import { buildValidator, shouldSkipCommandValidation } from './validate';

export interface ApplyStack {
  engine: ApplicationEngine;
  reverter: WorkingTreeReverter;
  contextBuilder: ContextBuilder;
}

/**
 * Apply, revert and context building for one checkout. Enough for `inspect`.
 */
export function createApplyStack(
  config: Pick<Config, 'apply' | 'reconcile'>,
  repoRoot: string,
  logger?: Logger,
  facility?: ApplyFacility,
): ApplyStack {
  const { reconcile } = config;
  return {
    engine: new ApplicationEngine(
      facility ?? new GitApplyFacility({ gitPath: config.apply.gitPath, timeoutMs: config.apply.timeoutMs }),
      { logger },
    ),
    reverter: new WorkingTreeReverter({
      strategy: reconcile.revertStrategy,
      git:
        reconcile.revertStrategy === 'git'
          ? new GitService({ repoRoot, gitPath: config.apply.gitPath })
          : undefined,
    }),
    contextBuilder: new ContextBuilder({
      excerptRadius: reconcile.excerptRadius,
      cleanExcerptRadius: reconcile.cleanExcerptRadius,
      searchRadius: reconcile.searchRadius,
    }),
  };
}

export interface PipelineOptions {
  config: Config;
  repoRoot: string;
  runId: string;
  logger: Logger;
  adapter: ProviderAdapter;
  providerId: string;
  /** --skip-validation */
  skipValidation?: boolean;
  env?: NodeJS.ProcessEnv;
  /** Overrides git apply, for tests */
  facility?: ApplyFacility;
  /** Overrides the provider-backed generator, for tests */
  generator?: FixGenerator;
  gate?: IntervalGate;
}

export interface Pipeline extends ApplyStack {
  reconciler: Reconciler;
  series: SeriesRunner;
  costTracker: CostTracker;
}

/**
 * Wires every reconciliation component from configuration.
 */
export function createPipeline(options: PipelineOptions): Pipeline {
  const { config, repoRoot, logger } = options;
  const stack = createApplyStack(config, repoRoot, logger, options.facility);
  const costTracker = new CostTracker(config);

  const generator =
    options.generator ??
    new ProviderFixGenerator({
      adapter: options.adapter,
      providerId: options.providerId,
      gate: options.gate ?? new IntervalGate(config.generator.minIntervalMs),
      config: config.generator,
      logger,
      runId: options.runId,
      repoRoot,
      costTracker,
    });

  const validator = buildValidator(config.validation, {
    skipCommands: shouldSkipCommandValidation(options.skipValidation, config.validation, options.env),
    logger,
  });

  const reconciler = new Reconciler({
    ...stack,
    generator,
    validator,
    logger,
    config: config.reconcile,
  });

  const series = new SeriesRunner({
    reconciler,
    engine: stack.engine,
    reverter: stack.reverter,
    writer: new PatchWriter(logger),
    logger,
  });

  return { ...stack, reconciler, series, costTracker };
}
