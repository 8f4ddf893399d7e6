/**
 * @fileoverview Single-token bucket limiter, one per external service.
 *
 * Each acquire() reserves the next free slot synchronously, so callers are
 * served strictly in arrival order and no two requests to the same service
 * start less than `intervalMs` apart.
 */

import { systemClock, type Clock } from '../utils/async.js';

export interface RateLimiterStats {
  granted: number;
  totalWaitMs: number;
}

export class RateLimiter {
  private nextFreeAt = Number.NEGATIVE_INFINITY;
  private granted = 0;
  private totalWaitMs = 0;

  constructor(
    readonly service: string,
    readonly intervalMs: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new RangeError(`Invalid rate-limit interval for ${service}: ${intervalMs}`);
    }
  }

  /**
   * Waits for the next token. Resolves immediately when the bucket is full.
   */
  async acquire(): Promise<void> {
    const now = this.clock.now();
    const slot = Math.max(now, this.nextFreeAt);
    this.nextFreeAt = slot + this.intervalMs;

    const wait = slot - now;
    this.granted++;
    this.totalWaitMs += wait;

    if (wait > 0) {
      await this.clock.sleep(wait);
    }
  }

  stats(): RateLimiterStats {
    return { granted: this.granted, totalWaitMs: this.totalWaitMs };
  }
}
