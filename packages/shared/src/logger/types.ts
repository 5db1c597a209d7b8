import type { PatchfixEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Logging surface used across patchfix.
 * Carries both structured reconciliation events and plain leveled messages.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'AttemptFinished', ... });
 * logger.child({ patch: '0001-fix.patch' }).info('reverting working tree');
 * ```
 */
export interface Logger {
  /** Persist a structured event. */
  log(event: PatchfixEvent): MaybePromise<void>;

  /** Structured event plus a human-readable summary. */
  trace(event: PatchfixEvent, message: string): MaybePromise<void>;

  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger whose messages are prefixed with `[k=v ...]`.
   */
  child(bindings: Record<string, unknown>): Logger;
}
