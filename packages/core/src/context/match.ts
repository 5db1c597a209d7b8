export interface MatchResult {
  /** 0-based line where the match starts */
  start: number;
  /** Sum of per-line scores: 2 for an exact line, 1 for a whitespace-equal one */
  score: number;
  /** Largest score any position could reach */
  maxScore: number;
}

export function normalizeWhitespace(line: string): string {
  return line.trim().replace(/\s+/g, ' ');
}

function lineScore(expected: string, actual: string | undefined): number {
  if (actual === undefined) return 0;
  if (expected === actual) return 2;
  return normalizeWhitespace(expected) === normalizeWhitespace(actual) ? 1 : 0;
}

/**
 * Scores every start position within `searchRadius` lines of `hintLine`
 * (0-based) and returns the best. Ties go to the position nearest the hint,
 * then to the earlier one.
 */
export function locateBestMatch(
  expected: readonly string[],
  lines: readonly string[],
  hintLine: number,
  searchRadius: number,
): MatchResult {
  const maxScore = expected.length * 2;
  const lastStart = Math.max(0, lines.length - 1);
  const hint = Math.min(Math.max(0, hintLine), lastStart);

  if (expected.length === 0 || lines.length === 0) {
    return { start: hint, score: 0, maxScore };
  }

  const lo = Math.max(0, hint - searchRadius);
  const hi = Math.min(lastStart, hint + searchRadius);

  let best: MatchResult = { start: hint, score: -1, maxScore };
  for (let start = lo; start <= hi; start++) {
    let score = 0;
    for (let i = 0; i < expected.length; i++) {
      score += lineScore(expected[i], lines[start + i]);
    }

    const nearer = Math.abs(start - hint) < Math.abs(best.start - hint);
    if (score > best.score || (score === best.score && nearer)) {
      best = { start, score, maxScore };
    }
    if (score === maxScore && start >= hint) break;
  }

  return best;
}
