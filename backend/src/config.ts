/**
 * @fileoverview Centralized configuration with environment validation.
 * Fails fast at startup if variables are invalid, then freezes everything the
 * analysis pipeline needs into one immutable AnalysisConfig.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { poiFiltersSchema } from './utils/validation.js';

const positiveInt = (fallback: string) =>
  z.string().transform(Number).pipe(z.number().int().positive()).default(fallback);

const nonNegativeInt = (fallback: string) =>
  z.string().transform(Number).pipe(z.number().int().nonnegative()).default(fallback);

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: positiveInt('3000'),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    CORS_ORIGIN: z.string().min(1).default('*'),

    // Geocode cache
    GEOCODE_CACHE_DRIVER: z.enum(['file', 'postgres']).default('file'),
    GEOCODE_CACHE_FILE: z.string().min(1).default('geocode_cache.json'),
    DATABASE_URL: z.string().min(1).optional(),
    DATABASE_SSL: z.string().optional(),
    DB_POOL_MAX: z
      .string()
      .transform(Number)
      .pipe(z.number().int().positive().max(50))
      .default('5'),

    // External services
    POSTCODES_IO_BASE_URL: z.string().url().default('https://api.postcodes.io'),
    NOMINATIM_BASE_URL: z.string().url().default('https://nominatim.openstreetmap.org'),
    OVERPASS_BASE_URL: z.string().url().default('https://overpass-api.de/api/interpreter'),
    GEOCODE_REGION_HINT: z.string().default('London, UK'),
    USER_AGENT: z.string().min(1).default('street-ranking/1.0 (+https://example.org/contact)'),

    // Rate limits (minimum interval between requests per service)
    POSTCODES_IO_INTERVAL_MS: nonNegativeInt('200'),
    NOMINATIM_INTERVAL_MS: nonNegativeInt('2000'),
    OVERPASS_INTERVAL_MS: nonNegativeInt('1000'),

    // Timeouts and retry policy
    GEOCODE_TIMEOUT_MS: positiveInt('10000'),
    OVERPASS_TIMEOUT_MS: positiveInt('240000'),
    OVERPASS_QUERY_TIMEOUT_S: positiveInt('180'),
    RETRY_ATTEMPTS: z
      .string()
      .transform(Number)
      .pipe(z.number().int().min(1).max(10))
      .default('3'),
    GEOCODE_BACKOFF_BASE_MS: nonNegativeInt('1000'),
    OVERPASS_BACKOFF_BASE_MS: nonNegativeInt('2000'),
    RETRY_JITTER_MS: nonNegativeInt('500'),

    // Analysis defaults
    DEFAULT_RADIUS_M: positiveInt('900'),
    DEFAULT_MAX_ASSIGN_M: z
      .string()
      .transform(Number)
      .pipe(z.number().positive())
      .default('200'),
    TOP_N_STREETS: z
      .string()
      .transform(Number)
      .pipe(z.number().int().min(1).max(10))
      .default('3'),

    FILTERS_FILE: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.GEOCODE_CACHE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when GEOCODE_CACHE_DRIVER=postgres',
      });
    }
  });

export type Config = z.infer<typeof envSchema>;

const presetSchema = poiFiltersSchema.extend({ name: z.string().min(1) });

const filterCatalogSchema = z.object({
  presets: z.record(presetSchema).refine((p) => 'custom' in p, 'A "custom" preset is required'),
  shop_types: z.array(z.string()),
  amenity_types: z.array(z.string()),
  property_selectors: z.array(z.string()),
});

export type Preset = z.infer<typeof presetSchema>;
export type FilterCatalog = z.infer<typeof filterCatalogSchema>;

/**
 * Per-service HTTP settings.
 */
export interface ServiceConfig {
  name: string;
  baseUrl: string;
  intervalMs: number;
  timeoutMs: number;
  backoffBaseMs: number;
}

/**
 * Everything the analysis pipeline reads from configuration.
 * Built once at startup and frozen.
 */
export interface AnalysisConfig {
  userAgent: string;
  retry: { attempts: number; jitterMs: number };
  services: {
    postcodesIo: ServiceConfig;
    nominatim: ServiceConfig;
    overpass: ServiceConfig;
  };
  geocodeRegionHint: string;
  overpassQueryTimeoutS: number;
  defaults: { radiusM: number; maxAssignM: number; topN: number };
  filters: FilterCatalog;
  geocodeCache: { driver: 'file' | 'postgres'; file: string };
}

const DEFAULT_FILTERS_URL = new URL('../data/filters.json', import.meta.url);

let config: Config | null = null;

/**
 * Load and validate configuration from environment variables.
 * Exits the process if validation fails.
 */
export function loadConfig(): Config {
  if (config) return config;

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('');
    console.error('=== CONFIGURATION ERROR ===');
    console.error('Missing or invalid environment variables:');
    result.error.issues.forEach((issue) => {
      console.error(`  ${issue.path.join('.') || 'unknown'}: ${issue.message}`);
    });
    console.error('===========================');
    console.error('');
    process.exit(1);
  }

  if (result.data.NODE_ENV === 'production' && result.data.CORS_ORIGIN === '*') {
    console.error('');
    console.error('=== SECURITY ERROR ===');
    console.error('Wildcard CORS (*) is not allowed in production.');
    console.error('Set CORS_ORIGIN to specific allowed origins.');
    console.error('======================');
    console.error('');
    process.exit(1);
  }

  config = result.data;
  return config;
}

/**
 * Parse an environment-like record without touching process state.
 * Throws a ZodError on invalid input.
 */
export function parseConfig(env: Record<string, string | undefined>): Config {
  return envSchema.parse(env);
}

/**
 * Reads and validates the preset/filter catalog.
 */
export function loadFilterCatalog(path: string | URL = DEFAULT_FILTERS_URL): FilterCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return filterCatalogSchema.parse(raw);
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Builds the immutable pipeline configuration from validated env values.
 */
export function buildAnalysisConfig(env: Config, filters: FilterCatalog): AnalysisConfig {
  return deepFreeze({
    userAgent: env.USER_AGENT,
    retry: { attempts: env.RETRY_ATTEMPTS, jitterMs: env.RETRY_JITTER_MS },
    services: {
      postcodesIo: {
        name: 'postcodes.io',
        baseUrl: env.POSTCODES_IO_BASE_URL.replace(/\/+$/, ''),
        intervalMs: env.POSTCODES_IO_INTERVAL_MS,
        timeoutMs: env.GEOCODE_TIMEOUT_MS,
        backoffBaseMs: env.GEOCODE_BACKOFF_BASE_MS,
      },
      nominatim: {
        name: 'nominatim',
        baseUrl: env.NOMINATIM_BASE_URL.replace(/\/+$/, ''),
        intervalMs: env.NOMINATIM_INTERVAL_MS,
        timeoutMs: env.GEOCODE_TIMEOUT_MS,
        backoffBaseMs: env.GEOCODE_BACKOFF_BASE_MS,
      },
      overpass: {
        name: 'overpass',
        baseUrl: env.OVERPASS_BASE_URL,
        intervalMs: env.OVERPASS_INTERVAL_MS,
        timeoutMs: env.OVERPASS_TIMEOUT_MS,
        backoffBaseMs: env.OVERPASS_BACKOFF_BASE_MS,
      },
    },
    geocodeRegionHint: env.GEOCODE_REGION_HINT,
    overpassQueryTimeoutS: env.OVERPASS_QUERY_TIMEOUT_S,
    defaults: {
      radiusM: env.DEFAULT_RADIUS_M,
      maxAssignM: env.DEFAULT_MAX_ASSIGN_M,
      topN: env.TOP_N_STREETS,
    },
    filters,
    geocodeCache: { driver: env.GEOCODE_CACHE_DRIVER, file: env.GEOCODE_CACHE_FILE },
  });
}
