/**
 * Error codes used throughout patchfix.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Patch input and working tree
  | 'PatchParseError'
  | 'PristineReadError'
  | 'PatchError'
  | 'ApplyConflict'
  // Reconciliation loop
  | 'FixGenerationError'
  | 'AttemptsExhausted'
  | 'ComplexityExceeded'
  // Provider layer
  | 'ProviderError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all patchfix errors.
 *
 * @example
 * ```typescript
 * throw new AppError('PatchError', 'git apply crashed', {
 *   cause: originalError,
 *   details: { exitCode: 128 },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Thrown when a patch has no recognisable file boundary. Fatal for that patch:
 * nothing is applied and no attempt is spent.
 */
export class MalformedPatchError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PatchParseError', message, options);
  }
}

/**
 * Thrown when one or more target files could not be read before apply
 * for a reason other than not existing.
 */
export class PristineReadError extends AppError {
  public readonly paths: string[];

  constructor(paths: string[], options: AppErrorOptions = {}) {
    super('PristineReadError', `Unable to capture pristine state for: ${paths.join(', ')}`, options);
    this.paths = paths;
  }
}

/**
 * Error thrown when a patch operation fails outside of ordinary hunk rejection
 * (the apply facility crashed, a revert did not restore the tree).
 */
export class PatchOpError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PatchError', message, options);
  }
}

/**
 * Raised when a working-tree revert leaves files that differ from the
 * pristine snapshot.
 */
export class RevertError extends PatchOpError {
  public readonly paths: string[];

  constructor(paths: string[], options: AppErrorOptions = {}) {
    super(`Working tree differs from pristine after revert: ${paths.join(', ')}`, options);
    this.paths = paths;
  }
}

/**
 * One or more files were rejected. Carries the file paths; the full outcome
 * map travels with the apply result.
 */
export class ApplyConflictError extends AppError {
  public readonly rejectedFiles: string[];

  constructor(rejectedFiles: string[], options: AppErrorOptions = {}) {
    super('ApplyConflict', `Patch rejected for: ${rejectedFiles.join(', ')}`, options);
    this.rejectedFiles = rejectedFiles;
  }
}

/**
 * The fix generator returned nothing usable (timeout, empty or truncated output).
 */
export class FixGenerationError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('FixGenerationError', message, options);
  }
}

/**
 * The attempt budget ran out. Only the most recent failure is reported.
 */
export class AttemptsExhaustedError extends AppError {
  public readonly attempts: number;
  public readonly lastFailureSignal?: string;
  public readonly lastCandidate?: string;

  constructor(
    attempts: number,
    options: AppErrorOptions & { lastFailureSignal?: string; lastCandidate?: string } = {},
  ) {
    super('AttemptsExhausted', `Patch could not be reconciled after ${attempts} attempt(s)`, options);
    this.attempts = attempts;
    this.lastFailureSignal = options.lastFailureSignal;
    this.lastCandidate = options.lastCandidate;
  }
}

/**
 * The initial rejection is too large to hand to the fix generator.
 */
export class ComplexityExceededError extends AppError {
  public readonly score: number;
  public readonly threshold: number;

  constructor(score: number, threshold: number, options: AppErrorOptions = {}) {
    super(
      'ComplexityExceeded',
      `Rejection complexity ${score} exceeds threshold ${threshold}`,
      options,
    );
    this.score = score;
    this.threshold = threshold;
  }
}

/**
 * Error thrown when an LLM provider fails.
 */
export class ProviderError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProviderError', message, options);
  }
}

/**
 * Error thrown when rate limited by an API.
 */
export class RateLimitError extends AppError {
  /** Suggested wait time in seconds before retrying */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Error thrown when provider registry operations fail.
 */
export class RegistryError extends ConfigError {
  public readonly exitCode = 2;
}
