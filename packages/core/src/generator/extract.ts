import { trimEmptyOuterLines } from '@patchfix/repo';

const MBOX_FROM_RE = /^From [0-9a-f]{7,40} /;

const HEADER_ONLY_PREFIXES = [
  'index ',
  'new file mode ',
  'deleted file mode ',
  'old mode ',
  'new mode ',
  'similarity index ',
  'dissimilarity index ',
  'rename from ',
  'rename to ',
  'copy from ',
  'copy to ',
  'GIT binary patch',
  'Binary files ',
];

/**
 * Pulls a complete patch out of free-form provider output. Looks inside
 * BEGIN_DIFF/END_DIFF markers first, then the first fenced block holding a
 * diff, then the raw text. An mbox header in front of the first file entry
 * is kept as written.
 */
export function extractCandidatePatch(outputText: string | undefined): string | null {
  if (!outputText) return null;

  const lines = outputText.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  const region = markerRegion(lines) ?? fencedRegion(lines) ?? lines;

  const firstDiff = findNextDiffStart(region, 0);
  if (firstDiff === -1) return null;

  const headerStart = region.findIndex((line, idx) => idx < firstDiff && MBOX_FROM_RE.test(line));
  const body = extractDiffBlocks(region.slice(firstDiff));
  if (body === null) return null;

  if (headerStart === -1) return body;
  return `${region.slice(headerStart, firstDiff).join('\n')}\n${body}`;
}

function markerRegion(lines: string[]): string[] | undefined {
  const begin = lines.findIndex((line) => {
    const t = line.trim();
    return t === 'BEGIN_DIFF' || t === '<BEGIN_DIFF>';
  });
  if (begin === -1) return undefined;
  const end = lines.findIndex((line, idx) => {
    if (idx <= begin) return false;
    const t = line.trim();
    return t === 'END_DIFF' || t === '<END_DIFF>' || t === '</END_DIFF>';
  });
  return end === -1 ? undefined : lines.slice(begin + 1, end);
}

function fencedRegion(lines: string[]): string[] | undefined {
  let i = 0;
  while (i < lines.length) {
    if (!lines[i].trim().startsWith('```')) {
      i++;
      continue;
    }
    // Closing fences are matched exactly: a diff line holding ``` always
    // carries a leading marker.
    const close = lines.findIndex((line, idx) => idx > i && line.trimEnd() === '```');
    if (close === -1) return undefined;
    const block = lines.slice(i + 1, close);
    if (findNextDiffStart(block, 0) !== -1) return block;
    i = close + 1;
  }
  return undefined;
}

function findNextDiffStart(lines: string[], fromIndex: number): number {
  for (let i = fromIndex; i < lines.length; i++) {
    const trimmedStart = lines[i].trimStart();
    if (trimmedStart.startsWith('diff --git')) return i;
    if (trimmedStart.startsWith('--- a/') || trimmedStart.startsWith('--- /dev/null')) {
      const next = lines[i + 1]?.trimStart() ?? '';
      if (next.startsWith('+++ b/') || next.startsWith('+++ /dev/null')) return i;
    }
  }
  return -1;
}

function extractDiffBlock(
  lines: string[],
  startLine: number,
): { blockLines: string[]; endLine: number; sawHunk: boolean } {
  const blockLines: string[] = [];
  let inHeader = true;
  let inHunk = false;
  let sawHunk = false;

  for (let i = startLine; i < lines.length; i++) {
    const rawLine = lines[i];
    const trimmedStart = rawLine.trimStart();

    if (
      trimmedStart.startsWith('diff --git') ||
      trimmedStart.startsWith('--- ') ||
      trimmedStart.startsWith('+++ ')
    ) {
      if (inHunk && !trimmedStart.startsWith('diff --git') && isHunkBodyLine(rawLine, lines[i + 1])) {
        blockLines.push(rawLine);
        continue;
      }
      inHeader = true;
      inHunk = false;
      blockLines.push(rawLine);
      continue;
    }

    if (HEADER_ONLY_PREFIXES.some((p) => trimmedStart.startsWith(p))) {
      if (inHeader) {
        if (trimmedStart.startsWith('GIT binary patch') || trimmedStart.startsWith('Binary files ')) {
          sawHunk = true;
        }
        blockLines.push(rawLine);
        continue;
      }
    }

    if (trimmedStart.startsWith('@@ ')) {
      inHeader = false;
      inHunk = true;
      sawHunk = true;
      blockLines.push(rawLine);
      continue;
    }

    if (inHunk) {
      if (rawLine === '' || /^[ \t]*[ +\-\\]/.test(rawLine)) {
        blockLines.push(rawLine);
        continue;
      }
      // Trailing commentary ends the diff.
      return { blockLines, endLine: i, sawHunk };
    }
  }

  return { blockLines, endLine: lines.length, sawHunk };
}

/**
 * A `---`/`+++` line inside a hunk is a removed or added line unless it
 * opens the next file's header pair.
 */
function isHunkBodyLine(line: string, next: string | undefined): boolean {
  if (line.trimStart().startsWith('--- ')) {
    return !(next ?? '').trimStart().startsWith('+++ ');
  }
  return true;
}

function dedentUnifiedDiff(text: string): string {
  const lines = text.split('\n');
  const headerLikePrefixes = [...HEADER_ONLY_PREFIXES, 'diff --git', '--- ', '+++ ', '@@ '];

  const indents: number[] = [];
  for (const line of lines) {
    if (line === '') continue;
    const trimmedStart = line.trimStart();
    if (!headerLikePrefixes.some((p) => trimmedStart.startsWith(p))) continue;
    indents.push(line.length - trimmedStart.length);
  }

  const commonIndent = indents.length > 0 ? Math.min(...indents) : 0;
  if (commonIndent <= 0) return text;

  return lines
    .map((line) => (line.length < commonIndent ? line : line.slice(commonIndent)))
    .join('\n');
}

function extractDiffBlocks(lines: string[]): string | null {
  const blocks: string[] = [];

  let cursor = 0;
  while (cursor < lines.length) {
    const start = findNextDiffStart(lines, cursor);
    if (start === -1) break;

    const { blockLines, endLine, sawHunk } = extractDiffBlock(lines, start);
    cursor = Math.max(endLine, start + 1);

    if (!sawHunk || blockLines.length === 0) continue;
    blocks.push(blockLines.join('\n'));
  }

  if (blocks.length === 0) return null;
  const dedented = trimEmptyOuterLines(dedentUnifiedDiff(trimEmptyOuterLines(blocks.join('\n'))));
  return dedented.length > 0 ? dedented : null;
}
