import type {
  ExpectedVsActual,
  FileContext,
  FileExcerpt,
  FileOutcome,
  PatchContext,
} from '@patchfix/shared';
import { extractFileDiffs } from '@patchfix/repo';

/** Lines of the failure signal kept in the prompt, counted from the end */
export const MAX_SIGNAL_LINES = 500;

export const FIX_SYSTEM_PROMPT = `You repair unified-diff patches that no longer apply to the current source tree.

Rules:
1. Keep the intent of the original change exactly.
2. Keep the patch metadata header (From, Date, Subject) byte-for-byte.
3. Only change the diff content needed to make the patch apply.
4. Keep the code style and whitespace of the current files.
5. Include every file of the original patch, with relative paths.
6. Output only the corrected patch as one \`\`\`diff fenced block, with no commentary.`;

const STATUS_LABEL: Record<FileOutcome['kind'], string> = {
  'applied-clean': 'APPLIED CLEANLY',
  'applied-with-offset': 'APPLIED WITH OFFSET',
  rejected: 'REJECTED',
};

function fence(body: string, lang = ''): string {
  return `\`\`\`${lang}\n${body.replace(/\n$/, '')}\n\`\`\``;
}

/**
 * Keeps the last `max` lines of a failure signal.
 */
export function tailLines(text: string, max = MAX_SIGNAL_LINES): string {
  const lines = text.split('\n');
  if (lines.length <= max) return text;
  return ['...(truncated)...', ...lines.slice(lines.length - max)].join('\n');
}

function statusLine(file: FileContext): string {
  const { outcome } = file;
  const shift =
    outcome.kind === 'applied-with-offset'
      ? ` (${outcome.offsetLines > 0 ? '+' : ''}${outcome.offsetLines} lines)`
      : '';
  return `- ${file.path}: ${STATUS_LABEL[outcome.kind]}${shift}. ${capitalize(file.note)}.`;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function renderComparison(c: ExpectedVsActual): string {
  const parts = [
    `### ${c.filePath}, rejected hunk ${c.hunkIndex + 1}`,
    `The hunk expected this at line ${c.expectedLine}; the closest match starts at line ${c.actualStartLine}.`,
    'Expected by the patch:',
    fence(c.expected.join('\n')),
    'Current file:',
    fence(c.actual.length > 0 ? c.actual.join('\n') : '(nothing)'),
  ];
  if (c.differences.length > 0) {
    parts.push('Differences:', ...c.differences.map((d) => `- [${d.kind}] ${d.message}`));
  }
  return parts.join('\n');
}

function renderExcerpt(e: FileExcerpt): string {
  const width = String(e.endLine).length;
  const numbered = e.lines.map((line, i) => `${String(e.startLine + i).padStart(width)} | ${line}`);
  return [`### ${e.filePath}, lines ${e.startLine}-${e.endLine}`, fence(numbered.join('\n'))].join('\n');
}

/**
 * Serialises a PatchContext into the request text for the fix generator.
 *
 * The original patch comes first and in full on every attempt, because the
 * candidate must be a complete replacement for it.
 */
export function renderFixPrompt(context: PatchContext): string {
  const { patch, evaluatedPatch, files } = context;
  const sections: string[] = [];

  sections.push(['## Original patch', fence(patch.text, 'diff')].join('\n'));

  sections.push(
    [
      '## Patch metadata',
      patch.metadata.headerText === ''
        ? 'The patch has no metadata header.'
        : ['Reproduce this header exactly:', fence(patch.metadata.headerText)].join('\n'),
    ].join('\n'),
  );

  sections.push(['## File status', ...files.map(statusLine)].join('\n'));

  const comparisons = files.flatMap((f) => f.comparisons);
  if (comparisons.length > 0) {
    sections.push(['## Expected vs actual', ...comparisons.map(renderComparison)].join('\n\n'));
  }

  const excerpts = files.flatMap((f) => f.excerpts);
  if (excerpts.length > 0) {
    sections.push(['## Current file content', ...excerpts.map(renderExcerpt)].join('\n\n'));
  }

  if (evaluatedPatch !== patch) {
    const needsWork = files.filter((f) => f.outcome.kind !== 'applied-clean').map((f) => f.path);
    const previous = extractFileDiffs(evaluatedPatch, needsWork);
    if (previous !== '') {
      sections.push(
        [
          '## Previous attempt',
          'These entries of your previous patch did not apply cleanly:',
          fence(previous, 'diff'),
        ].join('\n'),
      );
    }
  }

  if (context.lastFailureSignal !== undefined) {
    sections.push(
      [
        `## Attempt ${context.attempt - 1} failed`,
        fence(tailLines(context.lastFailureSignal)),
        'Fix this specific failure first.',
      ].join('\n'),
    );
  }

  sections.push(
    [
      '## Task',
      'Produce a corrected patch that:',
      '1. Starts with the metadata header above, unchanged.',
      `2. Contains all ${patch.files.length} file(s) of the original patch.`,
      '3. Fixes rejected files using the current file content, not the expected content.',
      '4. Updates line numbers for files that applied with an offset.',
      '5. Leaves cleanly applied changes as they are.',
    ].join('\n'),
  );

  return `${sections.join('\n\n')}\n`;
}
