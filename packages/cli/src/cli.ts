import { Command, CommanderError } from 'commander';
import { version } from '../package.json';
import { registerFixCommand } from './commands/fix';
import { registerInspectCommand } from './commands/inspect';
import { OutputRenderer } from './output/renderer';
import type { CliContext, GlobalOptions } from './context';

import { ConfigError, UsageError } from '@patchfix/shared';

export const name = '@patchfix/cli';

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('patchfix')
    .description('Reconcile unified-diff patches with a source tree that has moved on')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerFixCommand(program, ctx);
  registerInspectCommand(program, ctx);

  return program;
}

/**
 * Runs the program and returns the process exit code: 0 on success, 1 when a
 * patch could not be reconciled or a runtime error occurred, 2 for usage and
 * configuration errors.
 */
export async function run(argv: string[], ctx: CliContext = { exitCode: 0 }): Promise<number> {
  const program = createProgram(ctx);
  try {
    await program.parseAsync(argv);
    return ctx.exitCode;
  } catch (e) {
    // commander already printed its own message; --help and --version exit 0
    if (e instanceof CommanderError) {
      return e.exitCode === 0 ? 0 : 2;
    }

    const opts = program.opts<GlobalOptions>();
    new OutputRenderer(!!opts.json).error(e, !!opts.verbose);

    if (e instanceof ConfigError || e instanceof UsageError) {
      return 2;
    }
    return 1;
  }
}
