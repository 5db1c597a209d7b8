import * as path from 'path';
import { findRepoRoot } from '@patchfix/repo';
import { UsageError } from '@patchfix/shared';

/**
 * What a command needs from the process running it. Tests pass their own.
 */
export interface CliContext {
  exitCode: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  runId?: string;
}

export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
};

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * `--repo` when given, otherwise the checkout enclosing the working directory.
 */
export async function resolveRepoRoot(ctx: CliContext, repo: string | undefined): Promise<string> {
  const cwd = ctx.cwd ?? process.cwd();
  return repo ? path.resolve(cwd, repo) : findRepoRoot(cwd);
}

export function resolveFrom(ctx: CliContext, target: string): string {
  return path.resolve(ctx.cwd ?? process.cwd(), target);
}
