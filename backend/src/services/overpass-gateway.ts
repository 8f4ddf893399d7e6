/**
 * @fileoverview Overpass API gateway: builds the POI and named-highway queries
 * around a district centroid and maps the raw elements to Poi / Street records.
 *
 * Both queries end in `out tags center;` so ways and relations come back with
 * a centroid instead of their full geometry.
 */

import { z } from 'zod';
import {
  CATEGORY_KEYS,
  getTag,
  type Coordinate,
  type OsmElementType,
  type Poi,
  type PoiFilters,
  type Street,
  type Tags,
} from '../types.js';
import { SELECTOR_PATTERN, TOKEN_PATTERN } from '../utils/validation.js';
import type { RetryingClient } from './retrying-client.js';

const ELEMENT_TYPES: OsmElementType[] = ['node', 'way', 'relation'];

/** Query used when no selector survives validation */
const DEFAULT_FILTERS: PoiFilters = {
  include_all_shops: true,
  shop_types: [],
  amenities: [],
  property_selectors: [],
};

/**
 * Drops any selector that could break out of the query text.
 */
export function sanitizeFilters(filters: PoiFilters): PoiFilters {
  return {
    include_all_shops: filters.include_all_shops,
    shop_types: filters.shop_types.filter((s) => TOKEN_PATTERN.test(s)),
    amenities: filters.amenities.filter((a) => TOKEN_PATTERN.test(a)),
    property_selectors: filters.property_selectors.filter((p) => SELECTOR_PATTERN.test(p)),
  };
}

function hasSelectors(filters: PoiFilters): boolean {
  return (
    filters.include_all_shops ||
    filters.shop_types.length > 0 ||
    filters.amenities.length > 0 ||
    filters.property_selectors.length > 0
  );
}

function around(radiusM: number, center: Coordinate): string {
  return `(around:${Math.round(radiusM)},${center.lat},${center.lon})`;
}

/**
 * Builds the Overpass QL union of every category selector.
 *
 * @example
 * buildPoiQuery({ lat: 51.515, lon: -0.072 }, 500, {
 *   include_all_shops: false, shop_types: ['bakery'], amenities: [], property_selectors: ['office=*'],
 * }, 180);
 * // [out:json][timeout:180];
 * // (
 * //   node(around:500,51.515,-0.072)["shop"~"^(bakery)$"];
 * //   ...
 * // );
 * // out tags center;
 */
export function buildPoiQuery(
  center: Coordinate,
  radiusM: number,
  filters: PoiFilters,
  timeoutS: number
): string {
  let clean = sanitizeFilters(filters);
  if (!hasSelectors(clean)) clean = DEFAULT_FILTERS;

  const area = around(radiusM, center);
  const clauses: string[] = [];
  const forEachType = (selector: string) => {
    for (const type of ELEMENT_TYPES) {
      clauses.push(`${type}${area}${selector};`);
    }
  };

  if (clean.include_all_shops) {
    forEachType('["shop"]');
  } else if (clean.shop_types.length > 0) {
    forEachType(`["shop"~"^(${clean.shop_types.join('|')})$"]`);
  }

  if (clean.amenities.length > 0) {
    forEachType(`["amenity"~"^(${clean.amenities.join('|')})$"]`);
  }

  for (const selector of clean.property_selectors) {
    const [key, value] = selector.split('=', 2);
    forEachType(value === '*' ? `["${key}"]` : `["${key}"="${value}"]`);
  }

  return `[out:json][timeout:${timeoutS}];\n(\n  ${clauses.join('\n  ')}\n);\nout tags center;`;
}

/**
 * Builds the query for every named highway way within the radius.
 */
export function buildStreetQuery(center: Coordinate, radiusM: number, timeoutS: number): string {
  return `[out:json][timeout:${timeoutS}];\nway["highway"]["name"]${around(radiusM, center)};\nout tags center;`;
}

const elementSchema = z.object({
  type: z.enum(['node', 'way', 'relation']),
  id: z.number(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  center: z.object({ lat: z.number(), lon: z.number() }).optional(),
  tags: z.record(z.string()).optional(),
});

type OverpassElement = z.infer<typeof elementSchema>;

const responseSchema = z.object({
  elements: z.array(z.unknown()),
  remark: z.string().optional(),
});

/**
 * Validates the response envelope and returns the elements that match the
 * element schema; malformed elements are dropped.
 */
export function parseElements(body: unknown): OverpassElement[] {
  const parsed = responseSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error('Unexpected Overpass response: missing elements array');
  }

  const elements: OverpassElement[] = [];
  for (const raw of parsed.data.elements) {
    const element = elementSchema.safeParse(raw);
    if (element.success) elements.push(element.data);
  }
  return elements;
}

/**
 * Overpass answers a query that ran out of time or memory with HTTP 200, a
 * `remark` starting with "runtime error" and partial or empty elements.
 */
export function overpassRuntimeError(body: unknown): string | null {
  const parsed = responseSchema.safeParse(body);
  const remark = parsed.success ? parsed.data.remark?.trim() : undefined;
  return remark && /^runtime error/i.test(remark) ? remark : null;
}

function locate(element: OverpassElement): Coordinate | null {
  if (element.type === 'node' && element.lat !== undefined && element.lon !== undefined) {
    return { lat: element.lat, lon: element.lon };
  }
  return element.center ? { lat: element.center.lat, lon: element.center.lon } : null;
}

function categorize(tags: Tags): Poi['category'] {
  for (const key of CATEGORY_KEYS) {
    const value = getTag(tags, key);
    if (value !== null) return { key, value };
  }
  return null;
}

/**
 * Maps POI query elements to Poi records. Elements without a usable
 * coordinate are skipped.
 */
export function toPois(elements: OverpassElement[]): Poi[] {
  const pois: Poi[] = [];
  for (const element of elements) {
    const location = locate(element);
    if (!location) continue;

    const tags: Tags = element.tags ?? {};
    pois.push({
      osm_id: element.id,
      osm_type: element.type,
      kind: element.type === 'node' ? 'point' : 'area',
      location,
      tags,
      street: getTag(tags, 'street'),
      postcode: getTag(tags, 'postcode'),
      name: getTag(tags, 'name'),
      category: categorize(tags),
    });
  }
  return pois;
}

/**
 * Maps highway elements to Street records. Unnamed highways cannot rank and
 * are not Streets.
 */
export function toStreets(elements: OverpassElement[]): Street[] {
  const streets: Street[] = [];
  for (const element of elements) {
    const tags: Tags = element.tags ?? {};
    const name = getTag(tags, 'name');
    if (!name || !element.center) continue;

    streets.push({
      osm_id: element.id,
      name,
      location: { lat: element.center.lat, lon: element.center.lon },
      highway: getTag(tags, 'highway'),
    });
  }
  return streets;
}

export class OverpassGateway {
  constructor(
    private readonly client: RetryingClient,
    private readonly endpoint: string,
    private readonly queryTimeoutS: number
  ) {}

  async fetchPois(center: Coordinate, radiusM: number, filters: PoiFilters): Promise<Poi[]> {
    const body = await this.run(buildPoiQuery(center, radiusM, filters, this.queryTimeoutS));
    return toPois(parseElements(body));
  }

  async fetchStreets(center: Coordinate, radiusM: number): Promise<Street[]> {
    const body = await this.run(buildStreetQuery(center, radiusM, this.queryTimeoutS));
    return toStreets(parseElements(body));
  }

  private run(query: string): Promise<unknown> {
    return this.client.execute({
      method: 'POST',
      url: this.endpoint,
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ data: query }).toString(),
      inspect: overpassRuntimeError,
    });
  }
}
