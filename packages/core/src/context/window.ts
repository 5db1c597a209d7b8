import type { FileExcerpt, FileOutcomeKind } from '@patchfix/shared';

export interface LineWindow {
  /** 0-based, inclusive */
  start: number;
  /** 0-based, exclusive */
  end: number;
}

/**
 * Lines `anchor - radius` through `last + radius`, both included and clamped
 * to the file, where `last` is the final line of the change. `span` is the
 * number of lines the change covers; an empty change covers only `anchor`.
 */
export function windowBounds(
  length: number,
  anchor: number,
  radius: number,
  span = 0,
): LineWindow {
  const last = anchor + Math.max(span, 1) - 1;
  const start = Math.min(Math.max(0, anchor - radius), length);
  const end = Math.max(start, Math.min(length, last + radius + 1));
  return { start, end };
}

export function windowExcerpt(
  filePath: string,
  status: FileOutcomeKind,
  lines: readonly string[],
  window: LineWindow,
): FileExcerpt {
  return {
    filePath,
    status,
    startLine: window.start + 1,
    endLine: window.end,
    lines: lines.slice(window.start, window.end),
  };
}

/**
 * Sorts windows and joins those that overlap or touch.
 */
export function mergeWindows(windows: readonly LineWindow[]): LineWindow[] {
  const sorted = [...windows].filter((w) => w.end > w.start).sort((a, b) => a.start - b.start);
  const merged: LineWindow[] = [];
  for (const w of sorted) {
    const last = merged[merged.length - 1];
    if (last && w.start <= last.end) {
      last.end = Math.max(last.end, w.end);
    } else {
      merged.push({ ...w });
    }
  }
  return merged;
}
