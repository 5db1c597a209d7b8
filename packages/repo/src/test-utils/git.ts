import { spawn, spawnSync } from 'child_process';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

export const hasGit = spawnSync('git', ['--version']).status === 0;

export const run = (cmd: string, args: string[], cwd: string) => {
  return new Promise<void>((resolve, reject) => {
    const p = spawn(cmd, args, { cwd, stdio: 'ignore' });
    p.on('close', (code) => {
      if (code === 0) resolve();
      else reject(new Error(`Command ${cmd} ${args.join(' ')} failed with code ${code}`));
    });
    p.on('error', reject);
  });
};

/**
 * Creates a temp git repo holding `files` as its first commit.
 */
export async function createRepo(files: Record<string, string>): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchfix-repo-'));
  await run('git', ['init', '-q'], dir);
  await run('git', ['config', 'user.email', 'test@example.com'], dir);
  await run('git', ['config', 'user.name', 'Test User'], dir);
  await run('git', ['config', 'commit.gpgsign', 'false'], dir);
  for (const [rel, content] of Object.entries(files)) {
    const abs = path.join(dir, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content);
  }
  await run('git', ['add', '-A'], dir);
  await run('git', ['commit', '-q', '-m', 'initial'], dir);
  return dir;
}

/** Numbered lines `line 1\n` .. `line n\n`. */
export function numberedLines(n: number, label = 'line'): string {
  return Array.from({ length: n }, (_, i) => `${label} ${i + 1}\n`).join('');
}
