import { spawn } from 'child_process';
import { PatchOpError, TimeoutError } from '@patchfix/shared';

export interface GitRunOptions {
  cwd: string;
  /** Written to stdin, which is then closed */
  input?: string;
  timeoutMs?: number;
  gitPath?: string;
}

export interface GitRunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Spawns git and collects its output. Resolves for any exit code; rejects
 * only when the process cannot be started or exceeds its timeout.
 */
export function runGit(args: string[], options: GitRunOptions): Promise<GitRunResult> {
  const gitPath = options.gitPath ?? 'git';

  return new Promise((resolve, reject) => {
    const child = spawn(gitPath, args, {
      cwd: options.cwd,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;

    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            child.kill('SIGKILL');
          }, options.timeoutMs)
        : undefined;

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code) => {
      if (timer) clearTimeout(timer);
      if (timedOut) {
        reject(new TimeoutError(`git ${args[0]} timed out after ${options.timeoutMs}ms`));
        return;
      }
      resolve({ exitCode: code ?? -1, stdout, stderr });
    });

    child.on('error', (err) => {
      if (timer) clearTimeout(timer);
      reject(new PatchOpError(`Failed to start git process: ${err.message}`, { cause: err }));
    });

    // git may exit before reading all of stdin (e.g. on a usage error).
    child.stdin.on('error', (err) => {
      stderr += `stdin: ${err.message}\n`;
    });
    if (options.input !== undefined) {
      child.stdin.write(options.input);
    }
    child.stdin.end();
  });
}

export interface GitServiceOptions {
  repoRoot: string;
  gitPath?: string;
  timeoutMs?: number;
}

/**
 * Thin wrapper over the git commands used to inspect and restore a checkout.
 */
export class GitService {
  private readonly repoRoot: string;
  private readonly gitPath: string;
  private readonly timeoutMs?: number;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
    this.gitPath = options.gitPath ?? 'git';
    this.timeoutMs = options.timeoutMs;
  }

  private async exec(args: string[]): Promise<string> {
    const result = await runGit(args, {
      cwd: this.repoRoot,
      gitPath: this.gitPath,
      timeoutMs: this.timeoutMs,
    });
    if (result.exitCode !== 0) {
      throw new PatchOpError(`Git command failed: git ${args.join(' ')}\n${result.stderr}`, {
        details: { exitCode: result.exitCode },
      });
    }
    return result.stdout.trim();
  }

  async getStatusPorcelain(): Promise<string> {
    return this.exec(['status', '--porcelain']);
  }

  /**
   * Restoring from the index would discard uncommitted edits, so the `git`
   * revert strategy refuses to start on a dirty tree.
   */
  async ensureCleanWorkingTree(options: { allowDirty?: boolean } = {}): Promise<void> {
    const status = await this.exec(['status', '--porcelain', '--untracked-files=no']);
    if (status && !options.allowDirty) {
      throw new PatchOpError(
        `Working tree is dirty. Commit or stash your changes before reconciling patches.\n\n${status}`,
      );
    }
  }

  /** The subset of `paths` that git tracks. */
  async trackedPaths(paths: string[]): Promise<string[]> {
    if (paths.length === 0) return [];
    const output = await this.exec(['ls-files', '--', ...paths]);
    const listed = new Set(output ? output.split('\n') : []);
    return paths.filter((p) => listed.has(p));
  }

  /** Restores tracked paths from the index. */
  async checkoutPaths(paths: string[]): Promise<void> {
    if (paths.length === 0) return;
    await this.exec(['checkout', '--', ...paths]);
  }
}
