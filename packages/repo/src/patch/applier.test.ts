import { describe, it, expect } from 'vitest';
import { GIT_APPLY_ARGS, ensureTrailingNewline, trimEmptyOuterLines } from './applier';

describe('applier input shaping', () => {
  it('drops empty outer lines but keeps whitespace-only context', () => {
    expect(trimEmptyOuterLines('\n\n--- a/x\n+++ b/x\n \n\n')).toBe('--- a/x\n+++ b/x\n ');
  });

  it('returns an empty string for blank input', () => {
    expect(trimEmptyOuterLines('\n\n')).toBe('');
  });

  it('adds a trailing newline only when missing', () => {
    expect(ensureTrailingNewline('a')).toBe('a\n');
    expect(ensureTrailingNewline('a\n')).toBe('a\n');
  });

  it('runs git apply in reject mode reading from stdin', () => {
    expect(GIT_APPLY_ARGS).toEqual(['apply', '--reject', '--whitespace=fix', '--verbose', '-']);
  });
});
