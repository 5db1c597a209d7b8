import { ConfigError, RateLimitError, TimeoutError } from '@patchfix/shared';

/**
 * Shape shared by the SDK error classes that carry an HTTP status.
 */
export interface APIErrorLike {
  status?: number;
  message: string;
}

/**
 * SDK-specific error checks supplied by each adapter.
 */
export interface ErrorTypeConfig {
  isAPIError: (error: unknown) => error is APIErrorLike;
  isTimeoutError: (error: unknown) => boolean;
  /** Reads a retry-after hint in seconds, when the SDK exposes one */
  retryAfter?: (error: unknown) => number | undefined;
}

/**
 * Common error mapping for HTTP provider adapters.
 */
export abstract class BaseProviderAdapter {
  protected abstract readonly errorConfig: ErrorTypeConfig;

  /**
   * - 429 becomes RateLimitError
   * - 401 and 403 become ConfigError
   * - SDK timeouts become TimeoutError
   *
   * Anything else is passed through so its status stays visible to the
   * retry policy.
   */
  protected mapError(error: unknown): Error {
    if (this.errorConfig.isAPIError(error)) {
      if (error.status === 429) {
        return new RateLimitError(error.message, {
          cause: error,
          retryAfter: this.errorConfig.retryAfter?.(error),
        });
      }
      if (error.status === 401 || error.status === 403) {
        return new ConfigError(error.message, { cause: error });
      }
    }

    if (this.errorConfig.isTimeoutError(error)) {
      return new TimeoutError(error instanceof Error ? error.message : String(error), {
        cause: error,
      });
    }

    if (error instanceof Error) return error;
    return new Error(String(error));
  }
}
