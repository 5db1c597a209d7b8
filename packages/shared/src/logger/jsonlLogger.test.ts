import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from 'path';
import { JsonlLogger } from './jsonlLogger';
import type { ReconcileStarted } from '../types/events';

const started: ReconcileStarted = {
  schemaVersion: 1,
  timestamp: '2023-01-01T00:00:00Z',
  runId: 'run-1',
  type: 'ReconcileStarted',
  payload: { patchName: '0001-fix.patch', fileCount: 2, maxAttempts: 3 },
};

describe('JsonlLogger', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it('appends events to file in JSONL format', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'patchfix-logger-test-'));
    const logPath = join(tmpDir, 'trace.jsonl');
    const logger = new JsonlLogger(logPath);

    await logger.log(started);
    await logger.trace({ ...started, timestamp: '2023-01-01T00:00:01Z' }, 'ignored');

    const lines = (await fs.readFile(logPath, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(started);
    expect(JSON.parse(lines[1]).timestamp).toBe('2023-01-01T00:00:01Z');
  });

  it('redacts secrets in event payloads', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'patchfix-logger-test-'));
    const logPath = join(tmpDir, 'trace.jsonl');
    const logger = new JsonlLogger(logPath);

    await logger.log({
      schemaVersion: 1,
      timestamp: '2023-01-01T00:00:00Z',
      runId: 'run-1',
      type: 'ProviderRequestFinished',
      payload: {
        provider: 'openai',
        durationMs: 5,
        success: false,
        error: 'bad key sk-aaaaaaaaaaaaaaaaaaaaaaaa',
      },
    });

    const parsed = JSON.parse(await fs.readFile(logPath, 'utf8'));
    expect(parsed.payload.error).toBe('bad key [REDACTED]');
  });

  it('prefixes messages for child loggers', () => {
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = new JsonlLogger('/dev/null');
    logger.child({ a: 1 }).child({ b: 'x' }).info('i');
    logger.child({}).warn('w');

    expect(infoSpy).toHaveBeenCalledWith('[a=1 b=x] i');
    expect(warnSpy).toHaveBeenCalledWith('w');
  });

  it('does not throw if appending to the file fails', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'patchfix-logger-test-'));
    // A directory path makes appendFile fail with EISDIR.
    const logger = new JsonlLogger(tmpDir);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(logger.log(started)).resolves.toBeUndefined();

    expect(errorSpy).toHaveBeenCalledWith(
      `Failed to write to log file at ${tmpDir}`,
      expect.any(Error),
    );
  });
});
