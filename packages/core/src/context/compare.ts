import type { Difference, ExpectedVsActual } from '@patchfix/shared';
import { normalizeWhitespace } from './match';

export interface CompareInput {
  filePath: string;
  hunkIndex: number;
  /** 1-based line the hunk header pointed at */
  expectedLine: number;
  expected: readonly string[];
  /** Pristine file lines; undefined when the file does not exist */
  lines: readonly string[] | undefined;
  /** 0-based start of the best match */
  start: number;
}

const isBlank = (line: string) => line.trim() === '';

function quote(line: string): string {
  return JSON.stringify(line);
}

/**
 * Compares the lines a rejected hunk expected against the pristine lines at
 * its best match, and labels every divergence.
 */
export function compareExpectedActual(input: CompareInput): ExpectedVsActual {
  const { filePath, hunkIndex, expectedLine, expected, lines, start } = input;

  if (lines === undefined) {
    return {
      filePath,
      hunkIndex,
      expectedLine,
      actualStartLine: 0,
      expected: [...expected],
      actual: [],
      differences: [
        {
          kind: 'missing',
          message: `${filePath} does not exist in the working tree`,
        },
      ],
    };
  }

  const differences: Difference[] = [];
  const span = matchedSpan(expected, lines, start);
  if (span !== expected.length) {
    differences.push({
      kind: 'line-count',
      line: start + 1,
      message: `hunk expects ${expected.length} line(s) here; the matching region spans ${span}`,
    });
  }

  const actual = lines.slice(start, start + Math.max(span, expected.length));
  let missing = 0;

  for (let i = 0; i < expected.length; i++) {
    const want = expected[i];
    const got = actual[i];
    const line = start + i + 1;

    if (got === undefined) {
      missing++;
      continue;
    }
    if (want === got) continue;

    if (isBlank(want) !== isBlank(got)) {
      differences.push({
        kind: 'blank-line',
        line,
        expected: want,
        actual: got,
        message: isBlank(want)
          ? `line ${line}: expected a blank line, found ${quote(got)}`
          : `line ${line}: expected ${quote(want)}, found a blank line`,
      });
    } else if (want.trimEnd() === got.trimEnd()) {
      differences.push({
        kind: 'whitespace',
        line,
        expected: want,
        actual: got,
        message: `line ${line}: trailing whitespace differs`,
      });
    } else if (normalizeWhitespace(want) === normalizeWhitespace(got)) {
      differences.push({
        kind: 'whitespace',
        line,
        expected: want,
        actual: got,
        message: `line ${line}: indentation or inner whitespace differs`,
      });
    } else {
      differences.push({
        kind: 'content',
        line,
        expected: want,
        actual: got,
        message: `line ${line}: expected ${quote(want)}, found ${quote(got)}`,
      });
    }
  }

  if (missing > 0) {
    differences.push({
      kind: 'missing',
      line: lines.length + 1,
      message: `${missing} expected line(s) fall past the end of the file (${lines.length} lines)`,
    });
  }

  return {
    filePath,
    hunkIndex,
    expectedLine,
    actualStartLine: start + 1,
    expected: [...expected],
    actual,
    differences,
  };
}

/**
 * Number of pristine lines between the match start and the line holding the
 * hunk's last expected line. Lines inserted or removed inside the region show
 * up as a span different from `expected.length`.
 */
function matchedSpan(expected: readonly string[], lines: readonly string[], start: number): number {
  const n = expected.length;
  if (n < 2) return n;

  const last = expected[n - 1];
  const natural = start + n - 1;
  if (lines[natural] === last || isBlank(last) || lines[start] !== expected[0]) return n;

  const limit = Math.min(lines.length - 1, natural + n);
  let bestEnd = -1;
  for (let p = start + 1; p <= limit; p++) {
    if (lines[p] !== last) continue;
    if (bestEnd === -1 || Math.abs(p - natural) < Math.abs(bestEnd - natural)) bestEnd = p;
  }
  return bestEnd === -1 ? n : bestEnd - start + 1;
}
