import { describe, it, expect } from 'vitest';
import type { FileOutcome, OutcomeMap } from '@patchfix/shared';
import { complexityScore, pathsByKind, rejectionSignal } from './complexity';

const outcomes: OutcomeMap = new Map<string, FileOutcome>([
  ['clean.c', { kind: 'applied-clean' }],
  ['moved.c', { kind: 'applied-with-offset', offsetLines: 4, hunkOffsets: [{ hunk: 1, offsetLines: 4 }] }],
  [
    'x.c',
    {
      kind: 'rejected',
      rejectedFragments: ['@@ -1 +1 @@\n-a\n+b\n@@ -5 +5 @@\n-c\n+d', '@@ -9,2 +9,2 @@\n e\n-f\n+F'],
      diagnostics: ['error: patch failed: x.c:1'],
      hunkOffsets: [],
    },
  ],
  ['y.c', { kind: 'rejected', rejectedFragments: ['not a hunk'], diagnostics: [], hunkOffsets: [] }],
]);

describe('complexityScore', () => {
  it('counts rejected files plus failed hunks', () => {
    expect(complexityScore(outcomes)).toEqual({ rejectedFiles: 2, failedHunks: 4, score: 6 });
  });

  it('is zero when nothing was rejected', () => {
    expect(complexityScore(new Map<string, FileOutcome>([['a.c', { kind: 'applied-clean' }]]))).toEqual({
      rejectedFiles: 0,
      failedHunks: 0,
      score: 0,
    });
  });
});

describe('rejectionSignal', () => {
  it('lists each rejected file with its diagnostics and hunk headers', () => {
    expect(rejectionSignal(outcomes)).toBe(
      [
        'x.c: 2 hunk(s) rejected',
        '  error: patch failed: x.c:1',
        '  rejected: @@ -1 +1 @@',
        '  rejected: @@ -9,2 +9,2 @@',
        'y.c: 1 hunk(s) rejected',
        '  rejected: not a hunk',
      ].join('\n'),
    );
  });
});

describe('pathsByKind', () => {
  it('groups paths by outcome in patch order', () => {
    expect(pathsByKind(outcomes)).toEqual({ clean: ['clean.c'], offset: ['moved.c'], rejected: ['x.c', 'y.c'] });
  });
});
