import { ConfigError, RateLimitError, TimeoutError } from '@patchfix/shared';
import type { AdapterContext, RetryOptions } from '../types';

/**
 * Default retry policy for provider requests.
 *
 * Retried: RateLimitError, TimeoutError, HTTP 429 and 5xx, and the network
 * codes ETIMEDOUT, ECONNRESET and ECONNREFUSED (also when nested in `cause`).
 * Everything else fails on the first attempt, ConfigError and user aborts
 * included.
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * backoffFactor ^ (attempt - 1))
 * finalDelay = max(0, delay +/- 10% jitter, retryAfter * 1000)
 * ```
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

const RETRIABLE_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED']);

function numberField(value: unknown, key: 'status' | 'statusCode'): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

function errorCode(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const own: unknown = Reflect.get(value, 'code');
  if (typeof own === 'string') return own;
  const cause: unknown = Reflect.get(value, 'cause');
  if (typeof cause !== 'object' || cause === null) return undefined;
  const nested: unknown = Reflect.get(cause, 'code');
  return typeof nested === 'string' ? nested : undefined;
}

export function isRetriableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }

  const status = numberField(error, 'status') ?? numberField(error, 'statusCode');
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code = errorCode(error);
  return code !== undefined && RETRIABLE_CODES.has(code);
}

/**
 * Runs `requestFn` with retries, a per-attempt timeout and user
 * cancellation, logging ProviderRequestStarted and ProviderRequestFinished.
 *
 * ```typescript
 * const result = await executeProviderRequest(
 *   ctx,
 *   'anthropic',
 *   model,
 *   (signal) => client.messages.create({ ... }, { signal }),
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const { maxRetries, initialDelayMs, maxDelayMs, backoffFactor } = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };

  const startTime = Date.now();

  await ctx.logger.log({
    type: 'ProviderRequestStarted',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: { provider, model },
  });

  let attempts = 0;
  let lastError: unknown;

  // The per-request timeout starts once the throttle lets the call through.
  const send = async (): Promise<T> => {
    const abortController = new AbortController();
    const abortHandler = () => abortController.abort();

    if (ctx.abortSignal) {
      if (ctx.abortSignal.aborted) {
        abortController.abort();
      } else {
        ctx.abortSignal.addEventListener('abort', abortHandler);
      }
    }

    let timeoutId: NodeJS.Timeout | undefined;
    if (ctx.timeoutMs) {
      timeoutId = setTimeout(() => {
        abortController.abort(new TimeoutError(`Request timed out after ${ctx.timeoutMs}ms`));
      }, ctx.timeoutMs);
    }

    try {
      return await requestFn(abortController.signal);
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      ctx.abortSignal?.removeEventListener('abort', abortHandler);
    }
  };

  while (attempts <= maxRetries) {
    try {
      const result = ctx.throttle ? await ctx.throttle(send) : await send();

      await ctx.logger.log({
        type: 'ProviderRequestFinished',
        schemaVersion: 1,
        timestamp: new Date().toISOString(),
        runId: ctx.runId,
        payload: {
          provider,
          durationMs: Date.now() - startTime,
          success: true,
          retries: attempts,
        },
      });

      return result;
    } catch (error: unknown) {
      lastError = error;

      if (ctx.abortSignal?.aborted) {
        throw error;
      }
      if (error instanceof ConfigError) {
        break;
      }
      if (!isRetriableError(error) || attempts >= maxRetries) {
        break;
      }

      attempts++;

      const delay = Math.min(maxDelayMs, initialDelayMs * Math.pow(backoffFactor, attempts - 1));
      const jitter = delay * 0.1 * (Math.random() * 2 - 1);
      const hinted = error instanceof RateLimitError && error.retryAfter ? error.retryAfter * 1000 : 0;
      const finalDelay = Math.max(0, delay + jitter, hinted);

      await new Promise((resolve) => setTimeout(resolve, finalDelay));
    }
  }

  await ctx.logger.log({
    type: 'ProviderRequestFinished',
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    payload: {
      provider,
      durationMs: Date.now() - startTime,
      success: false,
      error: lastError instanceof Error ? lastError.message : String(lastError),
      retries: attempts,
    },
  });

  throw lastError;
}
