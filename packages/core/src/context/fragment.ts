const HUNK_HEADER_RE = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * One hunk of a rejected fragment, split into its old and new images.
 */
export interface RejectedHunk {
  header: string;
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  /** Context and removed lines without their prefix: what the file should hold */
  expected: string[];
  /** Context and added lines without their prefix */
  replacement: string[];
  /** Lines the hunk adds */
  added: string[];
  /** Lines the hunk removes */
  removed: string[];
}

/**
 * Parses the text of a rejected fragment (one or more `@@` hunks as written
 * to a `.rej` file). Text before the first header is ignored.
 */
export function parseRejectedFragment(text: string): RejectedHunk[] {
  const hunks: RejectedHunk[] = [];
  let current: RejectedHunk | undefined;

  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  for (const line of lines) {
    const header = HUNK_HEADER_RE.exec(line);
    if (header) {
      current = {
        header: line,
        oldStart: Number(header[1]),
        oldCount: header[2] === undefined ? 1 : Number(header[2]),
        newStart: Number(header[3]),
        newCount: header[4] === undefined ? 1 : Number(header[4]),
        expected: [],
        replacement: [],
        added: [],
        removed: [],
      };
      hunks.push(current);
      continue;
    }
    if (!current) continue;

    const marker = line.charAt(0);
    const body = line.slice(1);
    if (marker === '-') {
      current.expected.push(body);
      current.removed.push(body);
    } else if (marker === '+') {
      current.replacement.push(body);
      current.added.push(body);
    } else if (marker === ' ' || line === '') {
      // Mailers sometimes strip the space from blank context lines.
      current.expected.push(body);
      current.replacement.push(body);
    }
  }

  return hunks;
}
