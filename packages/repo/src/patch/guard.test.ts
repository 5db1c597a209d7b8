import { describe, it, expect } from 'vitest';
import { MalformedPatchError } from '@patchfix/shared';
import { assertPatchPathsSafe, unsafePathReason } from './guard';
import { parsePatch } from './parser';

describe('unsafePathReason', () => {
  it('accepts ordinary relative paths', () => {
    expect(unsafePathReason('src/lib/reader.c')).toBeUndefined();
    expect(unsafePathReason('docs/..notes.md')).toBeUndefined();
    expect(unsafePathReason('.gitignore')).toBeUndefined();
    expect(unsafePathReason('tools/.github/ci.yml')).toBeUndefined();
  });

  it('rejects traversal, including encoded forms', () => {
    expect(unsafePathReason('../etc/passwd')).toBe('Path traversal: ../etc/passwd');
    expect(unsafePathReason('src/%2e%2e/%2e%2e/x')).toBe('Path traversal: src/%2e%2e/%2e%2e/x');
  });

  it('rejects absolute and drive-letter paths', () => {
    expect(unsafePathReason('/etc/passwd')).toBe('Absolute path: /etc/passwd');
    expect(unsafePathReason('C:/Windows/x')).toBe('Absolute path: C:/Windows/x');
  });

  it('rejects paths inside .git', () => {
    expect(unsafePathReason('.git/config')).toBe('Repository metadata path: .git/config');
    expect(unsafePathReason('sub/.git/hooks/pre-commit')).toBe(
      'Repository metadata path: sub/.git/hooks/pre-commit',
    );
  });

  it('rejects null bytes', () => {
    expect(unsafePathReason('a%00.c')).toBe('Null byte in path: a%00.c');
  });
});

describe('assertPatchPathsSafe', () => {
  it('throws MalformedPatchError for a file entry outside the checkout', () => {
    const safe = parsePatch(['--- a/inside.txt', '+++ b/inside.txt', '@@ -1 +1 @@', '-a', '+b', ''].join('\n'));
    const files = safe.files.map((f) => ({ ...f, path: '../outside.txt' }));

    expect(() => assertPatchPathsSafe({ files })).toThrow(MalformedPatchError);
  });
});

describe('parsePatch path checks', () => {
  it('refuses a patch writing outside the checkout', () => {
    const text = ['--- a/../outside.txt', '+++ b/../outside.txt', '@@ -1 +1 @@', '-a', '+b', ''].join('\n');
    expect(() => parsePatch(text)).toThrow(new MalformedPatchError('Path traversal: ../outside.txt'));
  });

  it('refuses a patch writing into .git', () => {
    const text = ['diff --git a/.git/config b/.git/config', '--- a/.git/config', '+++ b/.git/config', '@@ -1 +1 @@', '-a', '+b', ''].join('\n');
    expect(() => parsePatch(text)).toThrow(MalformedPatchError);
  });
});
