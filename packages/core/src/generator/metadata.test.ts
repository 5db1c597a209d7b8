import { describe, it, expect } from 'vitest';
import { MalformedPatchError } from '@patchfix/shared';
import { parsePatch } from '@patchfix/repo';
import { preserveMetadata } from './metadata';

const HEADER = [
  'From 0123456789abcdef Mon Sep 17 00:00:00 2001',
  'From: Dev <dev@example.com>',
  'Subject: [PATCH] Keep a subject that spans',
  ' two lines',
  '',
  '',
].join('\n');
const BODY = ['diff --git a/x b/x', '--- a/x', '+++ b/x', '@@ -1 +1 @@', '-a', '+b', ''].join('\n');
const ORIGINAL = parsePatch(HEADER + BODY);

describe('preserveMetadata', () => {
  it('leaves a candidate with the same header untouched', () => {
    const result = preserveMetadata(ORIGINAL, HEADER + BODY.replace('+b', '+c'));
    expect(result.restored).toBe(false);
    expect(result.text).toBe(HEADER + BODY.replace('+b', '+c'));
  });

  it('restores a header the candidate altered', () => {
    const altered = HEADER.replace(' two lines\n', '') + BODY;
    const result = preserveMetadata(ORIGINAL, altered);
    expect(result.restored).toBe(true);
    expect(result.text).toBe(HEADER + BODY);
    expect(result.parsed.metadata.subject).toBe('[PATCH] Keep a subject that spans\n two lines');
  });

  it('restores a header the candidate dropped', () => {
    expect(preserveMetadata(ORIGINAL, BODY).text).toBe(HEADER + BODY);
  });

  it('rejects a candidate with no file entry', () => {
    expect(() => preserveMetadata(ORIGINAL, 'no diff here')).toThrow(MalformedPatchError);
  });
});
