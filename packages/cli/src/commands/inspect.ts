import { Command } from 'commander';
import { ConfigLoader, createApplyStack, inspectPatch, loadSeries, renderFixPrompt } from '@patchfix/core';
import { UsageError } from '@patchfix/shared';
import { createCliLogger } from '../logging';
import { OutputRenderer, toInspectOutput } from '../output/renderer';
import { resolveFrom, resolveRepoRoot, type CliContext, type GlobalOptions } from '../context';

interface InspectFlags {
  repo?: string;
  showPrompt?: boolean;
}

export function registerInspectCommand(program: Command, ctx: CliContext) {
  program
    .command('inspect')
    .argument('<patch>', 'The patch file to inspect')
    .description('Apply a patch once, report each file, and restore the checkout')
    .option('--repo <path>', 'Checkout the patch targets (default: the enclosing git checkout)')
    .option('--show-prompt', 'Print the prompt a first correction attempt would send')
    .action(async (patch: string, options: InspectFlags) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const repoRoot = await resolveRepoRoot(ctx, options.repo);
      const [entry, ...rest] = await loadSeries(resolveFrom(ctx, patch));
      if (!entry || rest.length > 0) {
        throw new UsageError(`inspect takes a single patch file: ${patch}`);
      }

      const config = ConfigLoader.load({
        configPath: globalOpts.config ? resolveFrom(ctx, globalOpts.config) : undefined,
        cwd: repoRoot,
        env: ctx.env,
      });
      const logger = await createCliLogger({ verbose: globalOpts.verbose, json: globalOpts.json });

      const report = await inspectPatch(createApplyStack(config, repoRoot, logger), repoRoot, entry.text);

      const output = toInspectOutput(entry.name, report.outcomes, report.complexity);
      if (options.showPrompt) output.prompt = renderFixPrompt(report.context);
      renderer.renderInspect(output);
      ctx.exitCode = 0;
    });
}
