import * as fs from 'fs/promises';
import type { PatchfixEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import { withPrefix } from './scope';
import type { Logger } from './types';

/**
 * Appends every structured event to a JSONL file, secrets redacted.
 * Leveled messages still go to the console.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, bindings: Record<string, unknown> = {}) {
    this.filePath = filePath;
    this.bindings = bindings;
  }

  async log(event: PatchfixEvent): Promise<void> {
    const line = JSON.stringify(redactForLogs(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // A broken trace file must not fail the reconciliation.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: PatchfixEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    console.debug(withPrefix(this.bindings, message));
  }

  info(message: string): void {
    console.info(withPrefix(this.bindings, message));
  }

  warn(message: string): void {
    console.warn(withPrefix(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(withPrefix(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings });
  }
}
