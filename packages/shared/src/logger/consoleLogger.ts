import type { PatchfixEvent } from '../types/events';
import { withPrefix } from './scope';
import type { Logger } from './types';

export interface ConsoleLoggerOptions {
  /** Print debug messages and raw events. Off by default. */
  verbose?: boolean;
  /** Send progress to stderr, keeping stdout for machine-readable output. */
  stderr?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly verbose: boolean;
  private readonly stderr: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.stderr = options.stderr ?? false;
  }

  private print(...args: unknown[]): void {
    if (this.stderr) console.error(...args);
    else console.log(...args);
  }

  log(event: PatchfixEvent): void {
    if (this.verbose) {
      this.print(JSON.stringify(event));
    }
  }

  trace(event: PatchfixEvent, message: string): void {
    if (this.verbose) {
      this.print(message, JSON.stringify(event));
    } else {
      this.print(message);
    }
  }

  debug(message: string): void {
    if (this.verbose) {
      if (this.stderr) console.error(message);
      else console.debug(message);
    }
  }

  info(message: string): void {
    if (this.stderr) console.error(message);
    else console.info(message);
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: PatchfixEvent) {
    return this.base.log(event);
  }

  trace(event: PatchfixEvent, message: string) {
    return this.base.trace(event, withPrefix(this.bindings, message));
  }

  debug(message: string) {
    return this.base.debug(withPrefix(this.bindings, message));
  }

  info(message: string) {
    return this.base.info(withPrefix(this.bindings, message));
  }

  warn(message: string) {
    return this.base.warn(withPrefix(this.bindings, message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? withPrefix(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }
}
