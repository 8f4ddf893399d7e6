/**
 * @fileoverview Resolves a postal district to a centroid coordinate.
 *
 * Lookup order:
 * 1. The durable geocode cache (no external call, no rate-limit token)
 * 2. Each configured provider in turn: postcodes.io outcode centroids first,
 *    then a Nominatim search as fallback
 *
 * A successful lookup is written to the cache before it is returned.
 */

import { z } from 'zod';
import type { Coordinate } from '../types.js';
import { ExternalServiceFailure, GeocodeFailure, describeError } from '../utils/errors.js';
import { isValidCoordinate } from '../utils/geo.js';
import type { Logger } from '../utils/logger.js';
import { normalizeDistrict } from '../utils/validation.js';
import type { GeocodeCache } from './geocode-cache.js';
import type { RetryingClient } from './retrying-client.js';

export type LookupOutcome =
  | { found: true; coordinate: Coordinate }
  | { found: false; reason: string };

/**
 * One external geocoding service.
 * Throws ExternalServiceFailure when the service cannot be reached.
 */
export interface GeocodeProvider {
  readonly name: string;
  lookup(district: string): Promise<LookupOutcome>;
}

const outcodeResponseSchema = z.object({
  status: z.number(),
  result: z
    .object({
      latitude: z.number().nullable(),
      longitude: z.number().nullable(),
    })
    .nullable(),
});

/**
 * postcodes.io outcode endpoint, which publishes a precomputed centroid
 * for every UK postcode district.
 */
export class PostcodesIoProvider implements GeocodeProvider {
  readonly name = 'postcodes.io';

  constructor(
    private readonly client: RetryingClient,
    private readonly baseUrl: string
  ) {}

  async lookup(district: string): Promise<LookupOutcome> {
    let body: unknown;
    try {
      body = await this.client.execute({
        method: 'GET',
        url: `${this.baseUrl}/outcodes/${encodeURIComponent(district)}`,
      });
    } catch (err) {
      if (err instanceof ExternalServiceFailure && err.isNotFound) {
        return { found: false, reason: `${this.name}: not found` };
      }
      throw err;
    }

    const parsed = outcodeResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { found: false, reason: `${this.name}: unexpected response shape` };
    }

    const { status, result } = parsed.data;
    if (status !== 200 || !result || result.latitude === null || result.longitude === null) {
      return { found: false, reason: `${this.name}: no centroid published` };
    }

    return { found: true, coordinate: { lat: result.latitude, lon: result.longitude } };
  }
}

const nominatimResultSchema = z.object({
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  address: z
    .object({
      postcode: z.string().optional(),
    })
    .optional(),
});

const nominatimResponseSchema = z.array(nominatimResultSchema);

/**
 * Nominatim free-text search. The centroid is the mean of every result whose
 * postcode belongs to the district; without such a match only a single,
 * unambiguous result is accepted.
 */
export class NominatimProvider implements GeocodeProvider {
  readonly name = 'nominatim';

  constructor(
    private readonly client: RetryingClient,
    private readonly baseUrl: string,
    private readonly regionHint: string
  ) {}

  async lookup(district: string): Promise<LookupOutcome> {
    const params = new URLSearchParams({
      q: this.regionHint ? `${district}, ${this.regionHint}` : district,
      format: 'jsonv2',
      limit: '10',
      addressdetails: '1',
    });

    const body = await this.client.execute({
      method: 'GET',
      url: `${this.baseUrl}/search?${params.toString()}`,
    });

    const parsed = nominatimResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { found: false, reason: `${this.name}: unexpected response shape` };
    }

    const results = parsed.data;
    if (results.length === 0) {
      return { found: false, reason: `${this.name}: no results` };
    }

    const exact = results.filter((r) => postcodeInDistrict(r.address?.postcode, district));
    if (exact.length > 0) {
      const lat = exact.reduce((sum, r) => sum + r.lat, 0) / exact.length;
      const lon = exact.reduce((sum, r) => sum + r.lon, 0) / exact.length;
      return { found: true, coordinate: { lat, lon } };
    }

    if (results.length === 1) {
      return { found: true, coordinate: { lat: results[0].lat, lon: results[0].lon } };
    }

    return {
      found: false,
      reason: `${this.name}: ambiguous (${results.length} results, none in district)`,
    };
  }
}

function postcodeInDistrict(postcode: string | undefined, district: string): boolean {
  if (!postcode) return false;
  const upper = postcode.trim().toUpperCase();
  return upper === district || upper.startsWith(`${district} `);
}

export class GeocodeResolver {
  private readonly inflight = new Map<string, Promise<Coordinate>>();
  private readonly logger: Logger;

  constructor(
    private readonly cache: GeocodeCache,
    private readonly providers: GeocodeProvider[],
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'geocode-resolver' });
  }

  /**
   * Resolves a district to its centroid.
   *
   * @throws {GeocodeFailure} when no provider can locate the district
   */
  async resolve(rawDistrict: string): Promise<Coordinate> {
    const district = normalizeDistrict(rawDistrict);

    const cached = this.cache.get(district);
    if (cached) {
      this.logger.debug({ district }, 'Geocode cache hit');
      return cached;
    }

    // Concurrent lookups of the same district share one external query
    const pending = this.inflight.get(district);
    if (pending) return pending;

    const lookup = this.lookupAndCache(district).finally(() => this.inflight.delete(district));
    this.inflight.set(district, lookup);
    return lookup;
  }

  private async lookupAndCache(district: string): Promise<Coordinate> {
    const reasons: string[] = [];
    let answered = 0;

    for (const provider of this.providers) {
      let outcome: LookupOutcome;
      try {
        outcome = await provider.lookup(district);
      } catch (err) {
        if (err instanceof ExternalServiceFailure) {
          reasons.push(err.message);
          this.logger.warn({ district, provider: provider.name, err: err.message }, 'Geocode provider failed');
          continue;
        }
        throw err;
      }
      answered++;

      if (!outcome.found) {
        reasons.push(outcome.reason);
        this.logger.info({ district, provider: provider.name, reason: outcome.reason }, 'Geocode provider miss');
        continue;
      }

      if (!isValidCoordinate(outcome.coordinate)) {
        reasons.push(`${provider.name}: invalid coordinate`);
        continue;
      }

      return this.store(district, outcome.coordinate, provider.name);
    }

    throw new GeocodeFailure(district, reasons, answered === 0);
  }

  private async store(district: string, coordinate: Coordinate, provider: string): Promise<Coordinate> {
    try {
      const written = await this.cache.set(district, coordinate);
      if (!written) {
        // Stored value wins so repeat lookups stay stable
        return this.cache.get(district) ?? coordinate;
      }
    } catch (err) {
      this.logger.error({ district, err: describeError(err) }, 'Could not persist geocode result');
    }

    this.logger.info({ district, provider, ...coordinate }, 'District geocoded');
    return coordinate;
  }
}
