import * as path from 'path';
import { ensureDir } from 'fs-extra';
import { ConsoleLogger, JsonlLogger, TeeLogger, type Logger } from '@patchfix/shared';

export interface CliLoggerOptions {
  verbose?: boolean;
  /** stdout carries the JSON report, so progress moves to stderr */
  json?: boolean;
  /** JSONL file receiving every structured event */
  tracePath?: string;
}

export async function createCliLogger(options: CliLoggerOptions): Promise<Logger> {
  const consoleLogger = new ConsoleLogger({ verbose: options.verbose, stderr: options.json });
  if (!options.tracePath) return consoleLogger;

  await ensureDir(path.dirname(options.tracePath));
  return new TeeLogger([consoleLogger, new JsonlLogger(options.tracePath)]);
}
