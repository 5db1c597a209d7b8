import { runGit } from '../git';

/**
 * Raw result of one invocation of the apply facility.
 */
export interface ApplyInvocation {
  exitCode: number;
  /** Progress and error lines, stderr first */
  output: string;
}

/**
 * Best-effort patch application: apply every hunk that fits, write the rest
 * aside as `<file>.rej`, and report progress line by line.
 */
export interface ApplyFacility {
  apply(repoRoot: string, patchText: string): Promise<ApplyInvocation>;
}

export interface GitApplyFacilityOptions {
  gitPath?: string;
  timeoutMs?: number;
}

export const GIT_APPLY_ARGS = ['apply', '--reject', '--whitespace=fix', '--verbose', '-'] as const;

/**
 * `git apply --reject` fed through stdin.
 */
export class GitApplyFacility implements ApplyFacility {
  constructor(private readonly options: GitApplyFacilityOptions = {}) {}

  async apply(repoRoot: string, patchText: string): Promise<ApplyInvocation> {
    const result = await runGit([...GIT_APPLY_ARGS], {
      cwd: repoRoot,
      input: ensureTrailingNewline(trimEmptyOuterLines(patchText)),
      gitPath: this.options.gitPath,
      timeoutMs: this.options.timeoutMs,
    });
    return {
      exitCode: result.exitCode,
      output: [result.stderr, result.stdout].filter((s) => s.length > 0).join('\n'),
    };
  }
}

/**
 * Removes completely empty leading and trailing lines, keeping lines that
 * hold only whitespace (those can be diff context).
 */
export function trimEmptyOuterLines(raw: string): string {
  const lines = raw.split('\n');
  const first = lines.findIndex((l) => l !== '');
  if (first === -1) return '';
  let last = lines.length - 1;
  while (last > first && lines[last] === '') last--;
  return lines.slice(first, last + 1).join('\n');
}

export function ensureTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}
