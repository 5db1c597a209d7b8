import * as path from 'path';
import { Command } from 'commander';
import {
  ConfigLoader,
  createPipeline,
  createProviderRegistry,
  loadSeries,
  type ConfigOverrides,
} from '@patchfix/core';
import { GitService } from '@patchfix/repo';
import { createCliLogger } from '../logging';
import { OutputRenderer, toFixOutput } from '../output/renderer';
import {
  parsePositiveInt,
  resolveFrom,
  resolveRepoRoot,
  type CliContext,
  type GlobalOptions,
} from '../context';

interface FixFlags {
  repo?: string;
  maxAttempts?: number;
  provider?: string;
  skipValidation?: boolean;
  outputDir?: string;
  keepApplied?: boolean;
}

export function registerFixCommand(program: Command, ctx: CliContext) {
  program
    .command('fix')
    .argument('<patches>', 'A patch file, or a directory of *.patch files applied in name order')
    .description('Reconcile patches that no longer apply to the checkout')
    .option('--repo <path>', 'Checkout the patches target (default: the enclosing git checkout)')
    .option('--max-attempts <n>', 'Correction attempts per patch', parsePositiveInt)
    .option('--provider <id>', 'Provider from the configuration that generates corrections')
    .option('--skip-validation', 'Skip the configured validation commands')
    .option('--output-dir <dir>', 'Write patches here instead of over the originals')
    .option('--keep-applied', 'Leave accepted patches applied when the series ends')
    .action(async (patches: string, options: FixFlags) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const repoRoot = await resolveRepoRoot(ctx, options.repo);
      const series = await loadSeries(resolveFrom(ctx, patches));

      const flags: ConfigOverrides = {};
      if (options.maxAttempts !== undefined) {
        flags.reconcile = { maxAttempts: options.maxAttempts };
      }
      const config = ConfigLoader.load({
        configPath: globalOpts.config ? resolveFrom(ctx, globalOpts.config) : undefined,
        cwd: repoRoot,
        flags,
        env: ctx.env,
      });

      if (config.reconcile.revertStrategy === 'git') {
        await new GitService({ repoRoot, gitPath: config.apply.gitPath }).ensureCleanWorkingTree();
      }

      const runId = ctx.runId ?? Date.now().toString();
      const logger = await createCliLogger({
        verbose: globalOpts.verbose,
        json: globalOpts.json,
        tracePath: config.tracePath ? path.resolve(repoRoot, config.tracePath) : undefined,
      });
      if (globalOpts.verbose) renderer.log(`Reconciling ${series.length} patch(es) against ${repoRoot}`);

      const registry = createProviderRegistry(config, { env: ctx.env, logger });
      const providerId = registry.resolveProviderId(options.provider, config.generator.provider);
      const adapter = await registry.getAdapter(providerId);

      const pipeline = createPipeline({
        config,
        repoRoot,
        runId,
        logger,
        adapter,
        providerId,
        skipValidation: options.skipValidation,
        env: ctx.env,
      });

      const controller = new AbortController();
      const onInterrupt = () => controller.abort();
      process.once('SIGINT', onInterrupt);
      try {
        const report = await pipeline.series.run(series, {
          repoRoot,
          runId,
          outputDir: options.outputDir ? resolveFrom(ctx, options.outputDir) : undefined,
          keepApplied: options.keepApplied,
          signal: controller.signal,
        });

        renderer.renderFix(toFixOutput(report, { runId, repoRoot, cost: pipeline.costTracker.getSummary() }));
        ctx.exitCode = report.succeeded ? 0 : 1;
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });
}
