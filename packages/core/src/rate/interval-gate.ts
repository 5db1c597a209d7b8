export interface GateClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: GateClock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

/**
 * Spaces out calls to a shared resource. Holders acquire in FIFO order; each
 * acquisition starts at least `minIntervalMs` after the previous one started,
 * and the next holder waits until the current one releases.
 */
export class IntervalGate {
  private tail: Promise<void> = Promise.resolve();
  private lastStart: number | undefined;

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: GateClock = systemClock,
  ) {}

  /**
   * Resolves with a release function once it is this caller's turn.
   */
  async acquire(signal?: AbortSignal): Promise<() => void> {
    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => turn);

    await previous;
    try {
      if (this.lastStart !== undefined) {
        const wait = this.lastStart + this.minIntervalMs - this.clock.now();
        if (wait > 0) await this.clock.sleep(wait, signal);
      }
      this.lastStart = this.clock.now();
    } catch (error) {
      release();
      throw error;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      release();
    };
  }

  /**
   * Runs `fn` while holding the gate.
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
