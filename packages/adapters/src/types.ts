import type { Logger } from '@patchfix/shared';

/**
 * Retry behaviour for transient provider failures.
 *
 * @example
 * ```typescript
 * const retryOptions: RetryOptions = {
 *   maxRetries: 5,
 *   initialDelayMs: 2000,
 *   maxDelayMs: 30000,
 *   backoffFactor: 1.5,
 * };
 * ```
 */
export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Initial delay in milliseconds before first retry. Default: 1000 */
  initialDelayMs?: number;
  /** Maximum delay cap in milliseconds. Default: 10000 */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff. Default: 2 */
  backoffFactor?: number;
}

/**
 * Per-request context handed to adapters.
 */
export interface AdapterContext {
  /** Identifier of the reconciliation run the request belongs to */
  runId: string;
  logger: Logger;
  /** Checkout being reconciled */
  repoRoot?: string;
  abortSignal?: AbortSignal;
  /** Maximum time in milliseconds for one request */
  timeoutMs?: number;
  retryOptions?: RetryOptions;
  /**
   * Wraps every call that reaches the provider, retries included. Adapters
   * must send each request through it when it is set.
   */
  throttle?: <T>(call: () => Promise<T>) => Promise<T>;
}
