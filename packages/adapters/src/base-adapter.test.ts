import { describe, it, expect } from 'vitest';
import { ConfigError, RateLimitError, TimeoutError } from '@patchfix/shared';
import { BaseProviderAdapter, type APIErrorLike, type ErrorTypeConfig } from './base-adapter';

class StatusError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly retryAfterSeconds?: number,
  ) {
    super(message);
  }
}

class TestAdapter extends BaseProviderAdapter {
  protected readonly errorConfig: ErrorTypeConfig = {
    isAPIError: (error: unknown): error is APIErrorLike => error instanceof StatusError,
    isTimeoutError: (error: unknown): boolean => error === 'timeout',
    retryAfter: (error: unknown) =>
      error instanceof StatusError ? error.retryAfterSeconds : undefined,
  };

  public map(error: unknown): Error {
    return this.mapError(error);
  }
}

describe('BaseProviderAdapter.mapError', () => {
  const adapter = new TestAdapter();

  it('maps 429 to RateLimitError with the retry hint', () => {
    const err = adapter.map(new StatusError(429, 'rate limited', 7));
    expect(err).toBeInstanceOf(RateLimitError);
    expect(err instanceof RateLimitError && err.retryAfter).toBe(7);
  });

  it('maps 401 and 403 to ConfigError', () => {
    expect(adapter.map(new StatusError(401, 'unauthorized'))).toBeInstanceOf(ConfigError);
    expect(adapter.map(new StatusError(403, 'forbidden'))).toBeInstanceOf(ConfigError);
  });

  it('passes through other API errors', () => {
    const original = new StatusError(500, 'server');
    expect(adapter.map(original)).toBe(original);
  });

  it('maps timeout errors to TimeoutError', () => {
    expect(adapter.map('timeout')).toBeInstanceOf(TimeoutError);
  });

  it('wraps non-Error values', () => {
    const err = adapter.map(123);
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('123');
  });
});
