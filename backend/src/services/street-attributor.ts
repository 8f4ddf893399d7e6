/**
 * @fileoverview Assigns each POI to a street name.
 *
 * An explicit `addr:street` tag always wins. Otherwise the POI goes to the
 * street whose centroid is nearest, provided it lies within the assignment
 * distance. The nearest-street search is a linear scan over every street.
 */

import type { Attribution, Poi, Street } from '../types.js';
import { haversineDistance } from '../utils/geo.js';

export interface NearestStreet {
  street: Street;
  distance_m: number;
}

/**
 * Nearest street to a point. On equal distances the earlier street in the
 * list is kept.
 */
export function findNearestStreet(poi: Poi, streets: readonly Street[]): NearestStreet | null {
  let best: NearestStreet | null = null;

  for (const street of streets) {
    const distance = haversineDistance(poi.location, street.location);
    if (best === null || distance < best.distance_m) {
      best = { street, distance_m: distance };
    }
  }

  return best;
}

/**
 * Produces one attribution per POI, in POI order.
 *
 * @param maxAssignM - Largest distance, in meters, at which an untagged POI is
 *   still given to its nearest street (inclusive)
 */
export function attribute(
  pois: readonly Poi[],
  streets: readonly Street[],
  maxAssignM: number
): Attribution[] {
  return pois.map((poi): Attribution => {
    if (poi.street !== null) {
      return { poi_id: poi.osm_id, street: poi.street, method: 'tag', distance_m: null };
    }

    const nearest = findNearestStreet(poi, streets);
    if (nearest === null) {
      return { poi_id: poi.osm_id, street: null, method: 'none', distance_m: null };
    }

    if (nearest.distance_m <= maxAssignM) {
      return {
        poi_id: poi.osm_id,
        street: nearest.street.name,
        method: 'nearest',
        distance_m: nearest.distance_m,
      };
    }

    return { poi_id: poi.osm_id, street: null, method: 'none', distance_m: nearest.distance_m };
  });
}
