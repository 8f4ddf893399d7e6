import type { GeocodeCache } from '../services/geocode-cache.js';
import type { Coordinate } from '../types.js';
import type { Clock } from '../utils/async.js';

/**
 * Clock whose sleep() returns at once and moves time forward.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private time = 0) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }

  advance(ms: number): void {
    this.time += ms;
  }
}

export class MemoryGeocodeCache implements GeocodeCache {
  readonly driver = 'file' as const;
  readonly entries = new Map<string, Coordinate>();
  writes = 0;

  constructor(initial: Record<string, Coordinate> = {}) {
    for (const [district, coordinate] of Object.entries(initial)) {
      this.entries.set(district, coordinate);
    }
  }

  async load(): Promise<void> {}

  get(district: string): Coordinate | null {
    return this.entries.get(district) ?? null;
  }

  async set(district: string, coordinate: Coordinate): Promise<boolean> {
    if (this.entries.has(district)) return false;
    this.entries.set(district, coordinate);
    this.writes++;
    return true;
  }

  size(): number {
    return this.entries.size;
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
