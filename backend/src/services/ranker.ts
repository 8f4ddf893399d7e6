/**
 * @fileoverview Aggregates attributions into a street ranking.
 */

import type { Attribution, StreetCount } from '../types.js';

export interface Ranking {
  /** First `topN` entries of `all` */
  top: StreetCount[];
  /** Every attributed street, count descending then name ascending */
  all: StreetCount[];
  totalPois: number;
  distinctStreets: number;
}

/**
 * Orders by count descending, then by name in code-unit order so the
 * output does not depend on the host locale.
 */
export function compareStreetCounts(a: StreetCount, b: StreetCount): number {
  if (a.count !== b.count) return b.count - a.count;
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

export function rank(attributions: readonly Attribution[], topN: number): Ranking {
  if (!Number.isInteger(topN) || topN < 1) {
    throw new RangeError(`topN must be a positive integer, got ${topN}`);
  }

  const counts = new Map<string, number>();
  for (const { street } of attributions) {
    if (street === null) continue;
    counts.set(street, (counts.get(street) ?? 0) + 1);
  }

  const all = [...counts].map(([name, count]) => ({ name, count })).sort(compareStreetCounts);

  return {
    top: all.slice(0, topN),
    all,
    totalPois: attributions.length,
    distinctStreets: all.length,
  };
}
