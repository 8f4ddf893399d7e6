/**
 * @fileoverview Timing and serialization primitives shared by the rate limiter,
 * the retrying client and the job controller.
 */

/**
 * Source of time. Injected so tests can run retry and rate-limit schedules
 * without real waiting.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => (ms > 0 ? sleep(ms) : Promise.resolve()),
};

/**
 * FIFO mutual exclusion. Tasks passed to runExclusive run one at a time in
 * the order they were submitted; a failing task releases the lock and its
 * error goes to its own caller only.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  /** Whether a task is running or waiting. */
  get isLocked(): boolean {
    return this.pending > 0;
  }
}
