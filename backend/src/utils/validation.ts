/**
 * @fileoverview Shared validation utilities for job submissions and POI filters.
 */

import { z } from 'zod';

/** Shop and amenity values that may appear in a query (e.g. `fast_food`) */
export const TOKEN_PATTERN = /^[a-z0-9_]+$/;

/** Property selectors such as `office=*` or `landuse=industrial` */
export const SELECTOR_PATTERN = /^[a-z0-9_]+=(\*|[a-z0-9_]+)$/;

/** Postal-district codes after normalization (E1, SW1A, EC2) */
export const DISTRICT_PATTERN = /^[A-Z0-9]{1,8}$/;

/** Maximum number of districts accepted in one job */
export const MAX_DISTRICTS_PER_JOB = 500;

/** Upper bound on search radius and assignment distance, in meters */
export const MAX_DISTANCE_M = 5000;

export const tokenSchema = z.string().regex(TOKEN_PATTERN, 'Must contain only a-z, 0-9 and _');

export const selectorSchema = z
  .string()
  .regex(SELECTOR_PATTERN, 'Must look like key=value or key=*');

export const poiFiltersSchema = z.object({
  include_all_shops: z.boolean(),
  shop_types: z.array(tokenSchema),
  amenities: z.array(tokenSchema),
  property_selectors: z.array(selectorSchema),
});

/** Body of a job submission. Districts may be a list or a comma/newline separated string. */
export const startJobSchema = z.object({
  districts: z.union([z.string(), z.array(z.string())]),
  preset: z.string().min(1).optional(),
  radius_m: z.coerce.number().int().positive().max(MAX_DISTANCE_M).optional(),
  max_assign_m: z.coerce.number().positive().max(MAX_DISTANCE_M).optional(),
  top_n: z.coerce.number().int().min(1).max(10).optional(),
  include_all_shops: z.boolean().optional(),
  shop_types: z.array(tokenSchema).optional(),
  amenities: z.array(tokenSchema).optional(),
  property_selectors: z.array(selectorSchema).optional(),
});

export type StartJobRequest = z.infer<typeof startJobSchema>;

export const advanceJobSchema = z
  .object({
    job_id: z.string().uuid().optional(),
  })
  .optional();

export const districtQuerySchema = z.object({
  district: z.string().trim().min(1, 'district is required'),
});

export function normalizeDistrict(raw: string): string {
  return raw.trim().toUpperCase();
}

/**
 * Splits a district submission into normalized codes, dropping blanks.
 * Duplicates are kept: each occurrence gets its own result row.
 */
export function parseDistricts(input: string | string[]): string[] {
  const parts = typeof input === 'string' ? input.split(/[,\n]/) : input;
  return parts.map(normalizeDistrict).filter((d) => d.length > 0);
}
