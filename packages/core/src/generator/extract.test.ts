import { describe, it, expect } from 'vitest';
import { extractCandidatePatch } from './extract';

const DIFF = ['diff --git a/x b/x', '--- a/x', '+++ b/x', '@@ -1 +1 @@', '-a', '+b'].join('\n');

describe('extractCandidatePatch', () => {
  it('takes the diff out of a fenced block surrounded by prose', () => {
    expect(extractCandidatePatch(`Here is the fix:\n\`\`\`diff\n${DIFF}\n\`\`\`\nDone.`)).toBe(DIFF);
  });

  it('skips fenced blocks that hold no diff', () => {
    expect(extractCandidatePatch(`\`\`\`\nnpm test\n\`\`\`\n\`\`\`diff\n${DIFF}\n\`\`\``)).toBe(DIFF);
  });

  it('prefers marker blocks', () => {
    expect(extractCandidatePatch(`noise\nBEGIN_DIFF\n${DIFF}\nEND_DIFF\nmore noise`)).toBe(DIFF);
  });

  it('keeps an mbox header in front of the first file entry', () => {
    const mail = [
      'From abcdef1 Mon Sep 17 00:00:00 2001',
      'From: A <a@example.com>',
      'Subject: [PATCH] x',
      '',
      '---',
      ' x | 2 +-',
      '',
      DIFF,
      '',
    ].join('\n');
    expect(extractCandidatePatch(mail)).toBe(mail.slice(0, -1));
  });

  it('stops at commentary after the last hunk', () => {
    expect(extractCandidatePatch(`${DIFF}\nThis changes a to b.`)).toBe(DIFF);
  });

  it('dedents a uniformly indented diff', () => {
    const indented = DIFF.split('\n')
      .map((l) => `    ${l}`)
      .join('\n');
    expect(extractCandidatePatch(indented)).toBe(DIFF);
  });

  it('normalises CRLF line endings', () => {
    expect(extractCandidatePatch(DIFF.replace(/\n/g, '\r\n'))).toBe(DIFF);
  });

  it('returns null when there is no diff', () => {
    expect(extractCandidatePatch('I could not fix this patch.')).toBeNull();
    expect(extractCandidatePatch(undefined)).toBeNull();
    expect(extractCandidatePatch('@@ -1 +1 @@\n-a\n+b')).toBeNull();
  });
});
