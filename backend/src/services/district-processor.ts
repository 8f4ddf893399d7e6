/**
 * @fileoverview Runs the full analysis for one district:
 * geocode → fetch POIs → fetch streets → attribute → rank.
 *
 * Every failure is turned into a failed DistrictResult here. Nothing thrown by
 * the stages below reaches the job controller.
 */

import type { AnalysisParams, Coordinate, DistrictResult, Poi, PoiFilters, Street } from '../types.js';
import { AppError, describeError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { normalizeDistrict } from '../utils/validation.js';
import { rank } from './ranker.js';
import { attribute } from './street-attributor.js';

export interface DistrictGeocoder {
  resolve(district: string): Promise<Coordinate>;
}

export interface PoiSource {
  fetchPois(center: Coordinate, radiusM: number, filters: PoiFilters): Promise<Poi[]>;
  fetchStreets(center: Coordinate, radiusM: number): Promise<Street[]>;
}

const UNEXPECTED_ERROR = 'Unexpected error while processing district';

/** Shortest full postcode written without a space ("E16AN") */
const MIN_COMPACT_POSTCODE = 5;

/**
 * Outward code of a UK postcode: "E1 6AN" → "E1", "E16AN" → "E1". A value
 * too short to carry an inward code ("SW1A") is already an outward code.
 */
export function outwardCode(postcode: string): string {
  const compact = postcode.trim().toUpperCase();
  const space = compact.indexOf(' ');
  if (space !== -1) return compact.slice(0, space);
  return compact.length >= MIN_COMPACT_POSTCODE ? compact.slice(0, -3) : compact;
}

/**
 * Drops POIs whose postcode places them in another district. POIs without a
 * postcode are kept.
 */
export function filterByDistrict(pois: readonly Poi[], district: string): Poi[] {
  return pois.filter((poi) => poi.postcode === null || outwardCode(poi.postcode) === district);
}

export function failedResult(district: string, error: string, center: Coordinate | null = null): DistrictResult {
  return {
    district,
    success: false,
    error,
    center,
    total_pois: 0,
    total_streets: 0,
    top_streets: [],
    all_streets: [],
  };
}

export class DistrictProcessor {
  private readonly logger: Logger;

  constructor(
    private readonly geocoder: DistrictGeocoder,
    private readonly source: PoiSource,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'district-processor' });
  }

  /**
   * Never rejects: failures come back as `success: false` results.
   */
  async process(rawDistrict: string, params: AnalysisParams): Promise<DistrictResult> {
    const district = normalizeDistrict(rawDistrict);
    const started = Date.now();
    let center: Coordinate | null = null;

    try {
      center = await this.geocoder.resolve(district);

      const fetched = await this.source.fetchPois(center, params.radius_m, params.filters);
      const pois = filterByDistrict(fetched, district);

      // Nothing to attribute, so the street query is skipped
      const streets = pois.length > 0 ? await this.source.fetchStreets(center, params.radius_m) : [];
      const attributions = attribute(pois, streets, params.max_assign_m);
      const ranking = rank(attributions, params.top_n);

      this.logger.info(
        {
          district,
          pois: ranking.totalPois,
          dropped: fetched.length - pois.length,
          streets: streets.length,
          ranked: ranking.distinctStreets,
          durationMs: Date.now() - started,
        },
        'District processed'
      );

      return {
        district,
        success: true,
        error: null,
        center,
        total_pois: ranking.totalPois,
        total_streets: ranking.distinctStreets,
        top_streets: ranking.top,
        all_streets: ranking.all,
      };
    } catch (err) {
      if (err instanceof AppError) {
        this.logger.warn({ district, code: err.code, err: err.message }, 'District failed');
        return failedResult(district, err.message, center);
      }

      this.logger.error({ district, err }, 'Unexpected error while processing district');
      return failedResult(district, `${UNEXPECTED_ERROR}: ${describeError(err)}`, center);
    }
  }
}
