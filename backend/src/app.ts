/**
 * @fileoverview Fastify application: security plugins, the central error
 * handler, service endpoints (/health, /meta, /filters) and the job and
 * geocode routes.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { healthCheck } from './db/connection.js';
import { geocodeRoutes } from './routes/geocode.js';
import { jobsRoutes } from './routes/jobs.js';
import type { AnalysisServices } from './services/factory.js';
import { AppError, type ErrorResponse } from './utils/errors.js';
import { loggerOptions, type LogLevel } from './utils/logger.js';

export const API_VERSION = '1.0.0';
export const ALGORITHM_VERSION = 'v2.0';

export type AppServices = Pick<AnalysisServices, 'config' | 'cache' | 'resolver' | 'jobs'> &
  Partial<Pick<AnalysisServices, 'clients' | 'limiters'>>;

export interface AppOptions {
  services: AppServices;
  /** Omit to disable request logging */
  logLevel?: LogLevel;
  corsOrigin?: string;
  /** Requests per minute per client */
  rateLimitMax?: number;
}

export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { services } = options;

  const fastify = Fastify({
    logger: options.logLevel ? loggerOptions(options.logLevel) : false,
  });

  // Register plugins
  await fastify.register(cors, {
    origin: options.corsOrigin ?? '*',
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(rateLimit, {
    max: options.rateLimitMax ?? 100,
    timeWindow: '1 minute',
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      const body: ErrorResponse = {
        error: {
          code: error.code,
          message: error.message,
          requestId: request.id,
          details: detailsOf(error),
        },
      };
      if (error.statusCode >= 500) {
        request.log.warn({ err: error }, 'Request failed');
      }
      return reply.status(error.statusCode).send(body);
    }

    // Framework errors: malformed JSON, unsupported media type, rate limit
    const status = error.statusCode ?? 500;
    if (status < 500) {
      const body: ErrorResponse = {
        error: { code: error.code ?? 'BAD_REQUEST', message: error.message, requestId: request.id },
      };
      return reply.status(status).send(body);
    }

    request.log.error({ err: error }, 'Unhandled error');
    const body: ErrorResponse = {
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error', requestId: request.id },
    };
    return reply.status(500).send(body);
  });

  // Health check
  fastify.get('/health', async () => {
    const cache = services.cache;
    const dbHealthy = cache.driver === 'postgres' ? await healthCheck() : true;
    return {
      status: dbHealthy ? 'healthy' : 'degraded',
      geocode_cache: { driver: cache.driver, entries: cache.size() },
      job: { state: services.jobs.status().state },
      timestamp: new Date().toISOString(),
    };
  });

  // API metadata and per-service request counters
  fastify.get('/meta', async () => {
    const { postcodesIo, nominatim, overpass } = services.config.services;
    const limiters = services.limiters ?? [];
    return {
      api_version: API_VERSION,
      algorithm_version: ALGORITHM_VERSION,
      services: [postcodesIo, nominatim, overpass].map((s) => ({
        name: s.name,
        min_interval_ms: s.intervalMs,
      })),
      defaults: {
        radius_m: services.config.defaults.radiusM,
        max_assign_m: services.config.defaults.maxAssignM,
        top_n: services.config.defaults.topN,
      },
      usage: (services.clients ?? []).map((client) => {
        const limiter = limiters.find((l) => l.service === client.service);
        return { service: client.service, ...client.stats(), ...limiter?.stats() };
      }),
    };
  });

  // Presets and selectable filter values
  fastify.get('/filters', async () => {
    const { presets, shop_types, amenity_types, property_selectors } = services.config.filters;
    return { presets, shop_types, amenity_types, property_selectors };
  });

  await fastify.register(jobsRoutes, { jobs: services.jobs });
  await fastify.register(geocodeRoutes, { resolver: services.resolver });

  return fastify;
}

function detailsOf(error: AppError): unknown {
  return 'details' in error ? error.details : undefined;
}
