import { describe, it, expect } from 'vitest';
import { MemoryLogger } from './memoryLogger';

describe('MemoryLogger', () => {
  it('records events and prefixed messages from children', () => {
    const root = new MemoryLogger();
    const child = root.child({ patch: '0001.patch' });

    child.log({
      type: 'ReconcileStarted',
      schemaVersion: 1,
      timestamp: '2025-01-01T00:00:00.000Z',
      runId: 'run-1',
      payload: { patchName: '0001.patch', fileCount: 2, maxAttempts: 3 },
    });
    child.info('reverting');
    root.error(new Error('boom'), 'apply failed');

    expect(root.eventsOf('ReconcileStarted')).toHaveLength(1);
    expect(root.eventsOf('AttemptFinished')).toEqual([]);
    expect(root.messages).toEqual([
      { level: 'info', message: '[patch=0001.patch] reverting' },
      { level: 'error', message: 'apply failed: boom' },
    ]);
  });
});
