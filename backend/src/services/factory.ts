/**
 * @fileoverview Wires the analysis pipeline from an AnalysisConfig: one rate
 * limiter and retrying client per external service, the geocode cache driver,
 * the resolver, the Overpass gateway, the district processor and the job
 * controller.
 */

import type { AnalysisConfig, ServiceConfig } from '../config.js';
import { initPool, type PoolSettings } from '../db/connection.js';
import type { Clock } from '../utils/async.js';
import type { Logger } from '../utils/logger.js';
import { FileGeocodeCache, PostgresGeocodeCache, type GeocodeCache } from './geocode-cache.js';
import { GeocodeResolver, NominatimProvider, PostcodesIoProvider } from './geocode-resolver.js';
import { DistrictProcessor } from './district-processor.js';
import { JobController } from './job-controller.js';
import { OverpassGateway } from './overpass-gateway.js';
import { RateLimiter } from './rate-limiter.js';
import { RetryingClient } from './retrying-client.js';

export interface AnalysisServices {
  config: AnalysisConfig;
  cache: GeocodeCache;
  resolver: GeocodeResolver;
  overpass: OverpassGateway;
  processor: DistrictProcessor;
  jobs: JobController;
  clients: RetryingClient[];
  limiters: RateLimiter[];
}

export interface ServiceOverrides {
  /** Required when the cache driver is postgres */
  database?: PoolSettings;
  cache?: GeocodeCache;
  fetch?: typeof fetch;
  clock?: Clock;
  random?: () => number;
}

/**
 * Builds every pipeline component. The cache is not loaded yet; call
 * `cache.load()` before serving requests.
 */
export function createAnalysisServices(
  config: AnalysisConfig,
  logger: Logger,
  overrides: ServiceOverrides = {}
): AnalysisServices {
  const clients: RetryingClient[] = [];
  const limiters: RateLimiter[] = [];

  const clientFor = (service: ServiceConfig): RetryingClient => {
    const limiter = new RateLimiter(service.name, service.intervalMs, overrides.clock);
    const client = new RetryingClient({
      service: service.name,
      limiter,
      policy: {
        maxAttempts: config.retry.attempts,
        backoffBaseMs: service.backoffBaseMs,
        jitterMs: config.retry.jitterMs,
        timeoutMs: service.timeoutMs,
      },
      logger,
      headers: { 'User-Agent': config.userAgent },
      fetch: overrides.fetch,
      clock: overrides.clock,
      random: overrides.random,
    });
    limiters.push(limiter);
    clients.push(client);
    return client;
  };

  const cache = overrides.cache ?? createGeocodeCache(config, logger, overrides.database);

  const { postcodesIo, nominatim, overpass } = config.services;
  const resolver = new GeocodeResolver(
    cache,
    [
      new PostcodesIoProvider(clientFor(postcodesIo), postcodesIo.baseUrl),
      new NominatimProvider(clientFor(nominatim), nominatim.baseUrl, config.geocodeRegionHint),
    ],
    logger
  );

  const gateway = new OverpassGateway(clientFor(overpass), overpass.baseUrl, config.overpassQueryTimeoutS);
  const processor = new DistrictProcessor(resolver, gateway, logger);

  const jobs = new JobController({
    runner: processor,
    presets: config.filters.presets,
    defaults: config.defaults,
    logger,
  });

  return { config, cache, resolver, overpass: gateway, processor, jobs, clients, limiters };
}

function createGeocodeCache(config: AnalysisConfig, logger: Logger, database?: PoolSettings): GeocodeCache {
  const cacheLogger = logger.child({ component: 'geocode-cache', driver: config.geocodeCache.driver });

  if (config.geocodeCache.driver === 'postgres') {
    if (!database) {
      throw new Error('Database settings are required for the postgres geocode cache');
    }
    initPool(database);
    return new PostgresGeocodeCache(cacheLogger);
  }

  return new FileGeocodeCache(config.geocodeCache.file, cacheLogger);
}
