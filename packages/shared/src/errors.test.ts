import { describe, it, expect } from 'vitest';
import {
  AppError,
  ApplyConflictError,
  AttemptsExhaustedError,
  ComplexityExceededError,
  ConfigError,
  FixGenerationError,
  MalformedPatchError,
  PatchOpError,
  PristineReadError,
  RateLimitError,
  RegistryError,
  RevertError,
  UsageError,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('ProviderError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });
});

describe('patch errors', () => {
  it('maps each class to its code', () => {
    expect(new ConfigError('x').code).toBe('ConfigError');
    expect(new UsageError('x').code).toBe('UsageError');
    expect(new MalformedPatchError('x').code).toBe('PatchParseError');
    expect(new PatchOpError('x').code).toBe('PatchError');
    expect(new FixGenerationError('x').code).toBe('FixGenerationError');
  });

  it('lists unreadable paths on PristineReadError', () => {
    const error = new PristineReadError(['a.c', 'b.c']);
    expect(error.code).toBe('PristineReadError');
    expect(error.paths).toEqual(['a.c', 'b.c']);
    expect(error.message).toBe('Unable to capture pristine state for: a.c, b.c');
  });

  it('makes RevertError a PatchOpError', () => {
    const error = new RevertError(['src/x.c']);
    expect(error).toBeInstanceOf(PatchOpError);
    expect(error.code).toBe('PatchError');
    expect(error.name).toBe('RevertError');
  });

  it('carries the rejected files on ApplyConflictError', () => {
    const error = new ApplyConflictError(['a.c']);
    expect(error.code).toBe('ApplyConflict');
    expect(error.rejectedFiles).toEqual(['a.c']);
  });

  it('keeps only the last signal and candidate on exhaustion', () => {
    const error = new AttemptsExhaustedError(3, {
      lastFailureSignal: 'hunk 2 failed',
      lastCandidate: 'diff --git a/x b/x',
    });
    expect(error.message).toBe('Patch could not be reconciled after 3 attempt(s)');
    expect(error.attempts).toBe(3);
    expect(error.lastFailureSignal).toBe('hunk 2 failed');
    expect(error.lastCandidate).toBe('diff --git a/x b/x');
  });

  it('reports score and threshold on ComplexityExceededError', () => {
    const error = new ComplexityExceededError(12, 10);
    expect(error.message).toBe('Rejection complexity 12 exceeds threshold 10');
    expect(error.code).toBe('ComplexityExceeded');
  });

  it('keeps retryAfter on RateLimitError', () => {
    const error = new RateLimitError('slow down', { retryAfter: 30 });
    expect(error.retryAfter).toBe(30);
  });

  it('gives RegistryError exit code 2', () => {
    const error = new RegistryError('unknown provider');
    expect(error).toBeInstanceOf(ConfigError);
    expect(error.exitCode).toBe(2);
  });
});
