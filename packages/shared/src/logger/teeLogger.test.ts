import { describe, it, expect, vi } from 'vitest';
import { TeeLogger } from './teeLogger';
import type { Logger } from './types';
import type { RollbackPerformed } from '../types/events';

function recordingLogger(): Logger & { events: string[]; messages: string[] } {
  const events: string[] = [];
  const messages: string[] = [];
  const self = {
    events,
    messages,
    log: vi.fn((e: { type: string }) => {
      events.push(e.type);
    }),
    trace: vi.fn((e: { type: string }) => {
      events.push(e.type);
    }),
    debug: vi.fn((m: string) => {
      messages.push(m);
    }),
    info: vi.fn((m: string) => {
      messages.push(m);
    }),
    warn: vi.fn((m: string) => {
      messages.push(m);
    }),
    error: vi.fn(),
    child: (): Logger => self,
  };
  return self;
}

const event: RollbackPerformed = {
  schemaVersion: 1,
  timestamp: '2023-01-01T00:00:00Z',
  runId: 'run-1',
  type: 'RollbackPerformed',
  payload: { reason: 'attempt 1 rejected', restoredFiles: 2, removedFiles: 1 },
};

describe('TeeLogger', () => {
  it('sends events to every logger and messages to the first', async () => {
    const a = recordingLogger();
    const b = recordingLogger();
    const tee = new TeeLogger([a, b]);

    await tee.log(event);
    await tee.info('hello');

    expect(a.events).toEqual(['RollbackPerformed']);
    expect(b.events).toEqual(['RollbackPerformed']);
    expect(a.messages).toEqual(['hello']);
    expect(b.messages).toEqual([]);
  });
});
