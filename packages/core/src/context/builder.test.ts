import { describe, it, expect } from 'vitest';
import type { FileOutcome, PristineEntry, PristineSnapshot } from '@patchfix/shared';
import { parsePatch } from '@patchfix/repo';
import { CLEAN_NOTE, ContextBuilder, OFFSET_NOTE, REJECTED_NOTE } from './builder';

const numbered = (prefix: string, n: number) =>
  Array.from({ length: n }, (_, i) => `${prefix}${i + 1}\n`).join('');

const PATCH = parsePatch(
  [
    'diff --git a/a.c b/a.c',
    '--- a/a.c',
    '+++ b/a.c',
    '@@ -2,3 +2,3 @@',
    ' l2',
    '-l3',
    '+L3',
    ' l4',
    'diff --git a/b.c b/b.c',
    '--- a/b.c',
    '+++ b/b.c',
    '@@ -3,2 +3,2 @@',
    ' x3',
    '-x4',
    '+X4',
    'diff --git a/c.c b/c.c',
    '--- a/c.c',
    '+++ b/c.c',
    '@@ -5 +5 @@',
    '-c5',
    '+C5',
    'diff --git a/new.c b/new.c',
    'new file mode 100644',
    '--- /dev/null',
    '+++ b/new.c',
    '@@ -0,0 +1 @@',
    '+hello',
    '',
  ].join('\n'),
);

function snapshot(files: Record<string, string | undefined>): PristineSnapshot {
  const entries = new Map<string, PristineEntry>();
  for (const [p, text] of Object.entries(files)) {
    entries.set(p, text === undefined ? { exists: false } : { exists: true, content: Buffer.from(text) });
  }
  return { files: entries, capturedAt: '2026-01-01T00:00:00.000Z' };
}

const SNAPSHOT = snapshot({
  'a.c': numbered('l', 10).replace('l3\n', 'THREE\n'),
  'b.c': numbered('x', 12),
  'c.c': numbered('c', 5),
  'new.c': undefined,
});

const OUTCOMES = new Map<string, FileOutcome>([
  [
    'a.c',
    {
      kind: 'rejected',
      rejectedFragments: [PATCH.files[0].hunks[0].text],
      diagnostics: ['error: patch failed: a.c:2'],
      hunkOffsets: [],
    },
  ],
  ['b.c', { kind: 'applied-with-offset', offsetLines: 2, hunkOffsets: [{ hunk: 1, offsetLines: 2 }] }],
  ['c.c', { kind: 'applied-clean' }],
  ['new.c', { kind: 'applied-clean' }],
]);

const builder = new ContextBuilder({ excerptRadius: 2, cleanExcerptRadius: 1, searchRadius: 20 });

describe('ContextBuilder', () => {
  const context = builder.build({ attempt: 1, patch: PATCH, outcomes: OUTCOMES, snapshot: SNAPSHOT });
  const file = (p: string) => context.files.find((f) => f.path === p);

  it('compares each rejected hunk with the pristine file at its best match', () => {
    const a = file('a.c');
    expect(a?.note).toBe(REJECTED_NOTE);
    expect(a?.comparisons).toEqual([
      {
        filePath: 'a.c',
        hunkIndex: 0,
        expectedLine: 2,
        actualStartLine: 2,
        expected: ['l2', 'l3', 'l4'],
        actual: ['l2', 'THREE', 'l4'],
        differences: [
          {
            kind: 'content',
            line: 3,
            expected: 'l3',
            actual: 'THREE',
            message: 'line 3: expected "l3", found "THREE"',
          },
        ],
      },
    ]);
    expect(a?.excerpts).toEqual([
      {
        filePath: 'a.c',
        status: 'rejected',
        startLine: 1,
        endLine: 6,
        lines: ['l1', 'l2', 'THREE', 'l4', 'l5', 'l6'],
      },
    ]);
  });

  it('anchors offset excerpts where the hunk actually landed', () => {
    const b = file('b.c');
    expect(b?.note).toBe(OFFSET_NOTE);
    expect(b?.excerpts).toEqual([
      {
        filePath: 'b.c',
        status: 'applied-with-offset',
        startLine: 3,
        endLine: 8,
        lines: ['x3', 'x4', 'x5', 'x6', 'x7', 'x8'],
      },
    ]);
  });

  it('uses the narrow radius for clean files', () => {
    const c = file('c.c');
    expect(c?.note).toBe(CLEAN_NOTE);
    expect(c?.excerpts).toEqual([
      { filePath: 'c.c', status: 'applied-clean', startLine: 4, endLine: 5, lines: ['c4', 'c5'] },
    ]);
  });

  it('gives files absent from the snapshot no excerpts', () => {
    expect(file('new.c')?.excerpts).toEqual([]);
  });

  it('keeps every file of the evaluated patch in patch order', () => {
    expect(context.files.map((f) => f.path)).toEqual(['a.c', 'b.c', 'c.c', 'new.c']);
    expect(context.evaluatedPatch).toBe(PATCH);
  });

  it('builds each attempt from its own outcomes and carries only the failure signal', () => {
    const next = builder.build({
      attempt: 2,
      patch: PATCH,
      evaluatedPatch: PATCH,
      outcomes: new Map<string, FileOutcome>([['a.c', { kind: 'applied-clean' }]]),
      snapshot: SNAPSHOT,
      lastFailureSignal: 'a.c: still rejected',
    });

    expect(next.attempt).toBe(2);
    expect(next.lastFailureSignal).toBe('a.c: still rejected');
    expect(next.files.map((f) => [f.path, f.outcome.kind])).toEqual([['a.c', 'applied-clean']]);
    expect(next.files[0].comparisons).toEqual([]);
  });
});
