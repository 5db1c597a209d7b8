import isBinaryPath from 'is-binary-path';
import {
  MalformedPatchError,
  type Hunk,
  type ParsedPatch,
  type PatchFile,
  type PatchMetadata,
} from '@patchfix/shared';
import { assertPatchPathsSafe } from './guard';

const DIFF_GIT_RE = /^diff --git a\/(.+?) b\/(.+)$/;
const HUNK_HEADER_RE = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const MBOX_FROM_RE = /^From [0-9a-f]{7,40} /;
const METADATA_KEY_RE = /^(From|Date|Subject):[ \t]?(.*)$/;

type MetadataKey = 'From' | 'Date' | 'Subject';

function isMetadataKey(value: string): value is MetadataKey {
  return value === 'From' || value === 'Date' || value === 'Subject';
}

/**
 * Parses unified-diff text into metadata plus an ordered list of file entries.
 *
 * File boundaries are `diff --git` lines. Patches without any such line fall
 * back to plain `--- x` / `+++ y` header pairs. Hunk bodies are kept as text;
 * only line counts are interpreted, to find where each hunk ends.
 *
 * A path that leaves the checkout or enters `.git` makes the patch malformed.
 */
export function parsePatch(text: string): ParsedPatch {
  const lines = text.split('\n');
  const boundaries = findFileBoundaries(lines);

  if (boundaries.length === 0) {
    throw new MalformedPatchError(
      'No file boundary found in patch (expected "diff --git" or a "---"/"+++" header pair)',
    );
  }

  const headerLines = lines.slice(0, boundaries[0]);
  const metadata = parseMetadata(headerLines);

  const files: PatchFile[] = [];
  for (let i = 0; i < boundaries.length; i++) {
    const start = boundaries[i];
    const end = i + 1 < boundaries.length ? boundaries[i + 1] : lines.length;
    files.push(parseFileEntry(lines.slice(start, end)));
  }
  assertPatchPathsSafe({ files });

  return Object.freeze({ metadata, files, text });
}

function findFileBoundaries(lines: string[]): number[] {
  const gitBoundaries: number[] = [];
  lines.forEach((line, idx) => {
    if (line.startsWith('diff --git ')) gitBoundaries.push(idx);
  });
  if (gitBoundaries.length > 0) return gitBoundaries;

  const plain: number[] = [];
  for (let i = 0; i + 1 < lines.length; i++) {
    if (lines[i].startsWith('--- ') && lines[i + 1].startsWith('+++ ')) {
      plain.push(i);
      i++;
    }
  }
  return plain;
}

/**
 * Reads `From <sha>`, `From:`, `Date:` and `Subject:` from the mail header.
 * Continuation lines (leading space or tab) belong to the key above them.
 */
export function parseMetadata(headerLines: string[]): PatchMetadata {
  const metadata: PatchMetadata = { headerText: headerLines.join('\n') };
  if (headerLines.length > 0) {
    // The header ends right before the first boundary line, so it carries
    // the newline that terminated its last line.
    metadata.headerText += '\n';
  }

  let currentKey: MetadataKey | undefined;
  const values: Partial<Record<MetadataKey, string[]>> = {};

  for (const line of headerLines) {
    if (MBOX_FROM_RE.test(line) && metadata.fromLine === undefined) {
      metadata.fromLine = line;
      currentKey = undefined;
      continue;
    }

    const keyMatch = METADATA_KEY_RE.exec(line);
    const key = keyMatch?.[1];
    if (keyMatch && key !== undefined && isMetadataKey(key)) {
      if (values[key] === undefined) {
        currentKey = key;
        values[key] = [keyMatch[2]];
        continue;
      }
    }

    if (currentKey && (line.startsWith(' ') || line.startsWith('\t'))) {
      values[currentKey]?.push(line);
      continue;
    }

    // Blank line or body text ends the current header field.
    currentKey = undefined;
  }

  if (values.From) metadata.author = values.From.join('\n');
  if (values.Date) metadata.date = values.Date.join('\n');
  if (values.Subject) metadata.subject = values.Subject.join('\n');
  return metadata;
}

function parseFileEntry(entryLines: string[]): PatchFile {
  let oldPath: string | undefined;
  let newPath: string | undefined;
  let isNew = false;
  let isDeleted = false;
  let isBinary = false;

  const gitMatch = DIFF_GIT_RE.exec(entryLines[0]);
  if (gitMatch) {
    oldPath = gitMatch[1];
    newPath = gitMatch[2];
  }

  const hunks: Hunk[] = [];
  let lastConsumed = 0;
  let i = gitMatch ? 1 : 0;

  while (i < entryLines.length) {
    const line = entryLines[i];

    if (line.startsWith('new file mode')) isNew = true;
    else if (line.startsWith('deleted file mode')) isDeleted = true;
    else if (line.startsWith('GIT binary patch') || /^Binary files .* differ$/.test(line)) {
      isBinary = true;
    } else if (line.startsWith('--- ') && hunks.length === 0) {
      const side = stripSide(line.slice(4), 'a/');
      if (side === undefined) isNew = true;
      else oldPath = side;
    } else if (line.startsWith('+++ ') && hunks.length === 0) {
      const side = stripSide(line.slice(4), 'b/');
      if (side === undefined) isDeleted = true;
      else newPath = side;
    }

    const header = HUNK_HEADER_RE.exec(line);
    if (header) {
      const hunk = readHunk(entryLines, i, header);
      hunks.push(hunk.hunk);
      i = hunk.next;
      lastConsumed = hunk.next - 1;
      continue;
    }

    if (hunks.length === 0) lastConsumed = i;
    i++;
  }

  const path = isDeleted ? oldPath ?? newPath : newPath ?? oldPath;
  if (path === undefined) {
    throw new MalformedPatchError(`Unable to determine file path for entry "${entryLines[0]}"`);
  }

  // Trailing lines after the last hunk (blank separators, a mail signature)
  // are not part of the file entry.
  const rawLines = hunks.length > 0 ? entryLines.slice(0, lastConsumed + 1) : trimTrailingEmpty(entryLines);

  return Object.freeze({
    path,
    oldPath: oldPath ?? path,
    isNew,
    isDeleted,
    isBinary: isBinary || isBinaryPath(path),
    lineRanges: hunks.map((h) => ({ start: h.newStart, end: h.newStart + h.newCount })),
    hunks,
    rawText: rawLines.join('\n'),
  });
}

function readHunk(
  lines: string[],
  headerIndex: number,
  match: RegExpExecArray,
): { hunk: Hunk; next: number } {
  const oldStart = Number(match[1]);
  const oldCount = match[2] === undefined ? 1 : Number(match[2]);
  const newStart = Number(match[3]);
  const newCount = match[4] === undefined ? 1 : Number(match[4]);

  let oldSeen = 0;
  let newSeen = 0;
  let i = headerIndex + 1;
  const body: string[] = [];

  while (i < lines.length && (oldSeen < oldCount || newSeen < newCount)) {
    const line = lines[i];
    if (HUNK_HEADER_RE.test(line)) break;

    if (line.startsWith('+')) newSeen++;
    else if (line.startsWith('-')) oldSeen++;
    else if (line.startsWith(' ') || line === '') {
      oldSeen++;
      newSeen++;
    } else if (!line.startsWith('\\')) {
      break;
    }
    body.push(line);
    i++;
  }

  // "\ No newline at end of file" may follow the last counted line.
  if (i < lines.length && lines[i].startsWith('\\')) {
    body.push(lines[i]);
    i++;
  }

  const header = lines[headerIndex];
  return {
    hunk: Object.freeze({
      header,
      oldStart,
      oldCount,
      newStart,
      newCount,
      lines: body,
      text: [header, ...body].join('\n'),
    }),
    next: i,
  };
}

function stripSide(value: string, prefix: 'a/' | 'b/'): string | undefined {
  // Plain diff -u appends a tab and a timestamp.
  const path = value.split('\t')[0].trim();
  if (path === '/dev/null') return undefined;
  return path.startsWith(prefix) ? path.slice(prefix.length) : path;
}

function trimTrailingEmpty(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1].trim() === '') end--;
  return lines.slice(0, end);
}

/**
 * Number of added plus removed lines across every hunk.
 */
export function countChangedLines(patch: ParsedPatch): number {
  let count = 0;
  for (const file of patch.files) {
    for (const hunk of file.hunks) {
      for (const line of hunk.lines) {
        if (line.startsWith('+') || line.startsWith('-')) count++;
      }
    }
  }
  return count;
}

/**
 * Re-emits the entries for the named files, in patch order.
 */
export function extractFileDiffs(patch: ParsedPatch, paths: Iterable<string>): string {
  const wanted = new Set(paths);
  return patch.files
    .filter((f) => wanted.has(f.path))
    .map((f) => f.rawText)
    .join('\n');
}

/**
 * Splits file content into lines without a phantom empty last line.
 */
export function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
