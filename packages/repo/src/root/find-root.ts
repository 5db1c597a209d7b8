import * as path from 'path';
import { pathExists } from 'fs-extra';
import { UsageError } from '@patchfix/shared';

/**
 * Walks up from `cwd` to the nearest directory holding `.git`.
 */
export async function findRepoRoot(cwd: string = process.cwd()): Promise<string> {
  const fsRoot = path.parse(cwd).root;
  let currentDir = path.resolve(cwd);

  while (true) {
    if (await pathExists(path.join(currentDir, '.git'))) {
      return currentDir;
    }
    if (currentDir === fsRoot) break;
    currentDir = path.dirname(currentDir);
  }

  throw new UsageError(
    `Could not detect a git checkout from ${cwd}. Pass --repo or run inside the target repository.`,
  );
}
