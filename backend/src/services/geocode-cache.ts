/**
 * @fileoverview Durable district → coordinate cache.
 *
 * Both drivers load every entry into memory at startup and persist each new
 * entry before `set` resolves. Entries are append-only: once a district has a
 * coordinate it is never evicted or overwritten.
 */

import { existsSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { query, queryOne } from '../db/connection.js';
import type { Coordinate } from '../types.js';
import { DatabaseError, describeError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export interface GeocodeCache {
  readonly driver: 'file' | 'postgres';
  /** Reads the persisted entries. Call once before use. */
  load(): Promise<void>;
  get(district: string): Coordinate | null;
  /**
   * Persists a coordinate for a district not yet cached.
   * Resolves false, leaving the stored value untouched, when the key exists.
   */
  set(district: string, coordinate: Coordinate): Promise<boolean>;
  size(): number;
}

const cacheFileSchema = z.record(
  z.object({
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
  })
);

/**
 * JSON file cache: `{ "E1": { "lat": 51.51, "lon": -0.06 }, ... }`.
 * Each write rewrites the file through a temporary sibling and a rename.
 */
export class FileGeocodeCache implements GeocodeCache {
  readonly driver = 'file' as const;
  private readonly entries = new Map<string, Coordinate>();

  constructor(
    private readonly path: string,
    private readonly logger: Logger
  ) {}

  async load(): Promise<void> {
    if (!existsSync(this.path)) {
      this.logger.info({ path: this.path }, 'No geocode cache file yet, starting empty');
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (err) {
      this.logger.warn({ path: this.path, err: describeError(err) }, 'Unreadable geocode cache, starting empty');
      return;
    }

    const parsed = cacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ path: this.path, issues: parsed.error.issues.length }, 'Invalid geocode cache, starting empty');
      return;
    }

    for (const [district, coordinate] of Object.entries(parsed.data)) {
      this.entries.set(district, coordinate);
    }
    this.logger.info({ path: this.path, entries: this.entries.size }, 'Geocode cache loaded');
  }

  get(district: string): Coordinate | null {
    const hit = this.entries.get(district);
    return hit ? { ...hit } : null;
  }

  async set(district: string, coordinate: Coordinate): Promise<boolean> {
    if (this.entries.has(district)) return false;

    const next = Object.fromEntries(this.entries);
    next[district] = { lat: coordinate.lat, lon: coordinate.lon };

    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, JSON.stringify(next, null, 2), 'utf-8');
    renameSync(tmp, this.path);

    this.entries.set(district, { lat: coordinate.lat, lon: coordinate.lon });
    return true;
  }

  size(): number {
    return this.entries.size;
  }
}

interface CacheRow {
  district: string;
  lat: number;
  lon: number;
}

/**
 * PostgreSQL cache, one row per district in `geocode_cache`.
 */
export class PostgresGeocodeCache implements GeocodeCache {
  readonly driver = 'postgres' as const;
  private readonly entries = new Map<string, Coordinate>();

  constructor(private readonly logger: Logger) {}

  async load(): Promise<void> {
    try {
      await query(
        `CREATE TABLE IF NOT EXISTS geocode_cache (
          district TEXT PRIMARY KEY,
          lat DOUBLE PRECISION NOT NULL,
          lon DOUBLE PRECISION NOT NULL,
          created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )`
      );
      const rows = await query<CacheRow>('SELECT district, lat, lon FROM geocode_cache');
      for (const row of rows) {
        this.entries.set(row.district, { lat: Number(row.lat), lon: Number(row.lon) });
      }
    } catch (err) {
      throw new DatabaseError('load geocode cache', err instanceof Error ? err : undefined);
    }
    this.logger.info({ entries: this.entries.size }, 'Geocode cache loaded');
  }

  get(district: string): Coordinate | null {
    const hit = this.entries.get(district);
    return hit ? { ...hit } : null;
  }

  async set(district: string, coordinate: Coordinate): Promise<boolean> {
    if (this.entries.has(district)) return false;

    let inserted: { district: string } | null;
    try {
      inserted = await queryOne<{ district: string }>(
        `INSERT INTO geocode_cache (district, lat, lon)
         VALUES ($1, $2, $3)
         ON CONFLICT (district) DO NOTHING
         RETURNING district`,
        [district, coordinate.lat, coordinate.lon]
      );
    } catch (err) {
      throw new DatabaseError('write geocode cache', err instanceof Error ? err : undefined);
    }

    if (inserted) {
      this.entries.set(district, { lat: coordinate.lat, lon: coordinate.lon });
      return true;
    }

    // Another process cached this district first; adopt its value
    const existing = await queryOne<CacheRow>(
      'SELECT district, lat, lon FROM geocode_cache WHERE district = $1',
      [district]
    );
    if (existing) {
      this.entries.set(district, { lat: Number(existing.lat), lon: Number(existing.lon) });
    }
    return false;
  }

  size(): number {
    return this.entries.size;
  }
}
