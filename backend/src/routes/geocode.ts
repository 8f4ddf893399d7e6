/**
 * @fileoverview Standalone district geocoding, backed by the same cache and
 * rate-limited providers as the analysis pipeline.
 */

import type { FastifyInstance } from 'fastify';
import type { GeocodeResolver } from '../services/geocode-resolver.js';
import { ExternalServiceFailure, GeocodeFailure, ValidationError } from '../utils/errors.js';
import { districtQuerySchema, normalizeDistrict } from '../utils/validation.js';

export interface GeocodeRoutesOptions {
  resolver: Pick<GeocodeResolver, 'resolve'>;
}

/**
 * GET /geocode/district?district=E1
 *
 * - 200 `{ district, lat, lon }`
 * - 404 `{ district, lat: null, lon: null, error }` when the district cannot be located
 * - 502 when no geocoding service could be reached
 */
export async function geocodeRoutes(fastify: FastifyInstance, options: GeocodeRoutesOptions) {
  const { resolver } = options;

  fastify.get('/geocode/district', async (request, reply) => {
    const parsed = districtQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      throw new ValidationError('Invalid query parameters', parsed.error.flatten());
    }

    const district = normalizeDistrict(parsed.data.district);

    try {
      const { lat, lon } = await resolver.resolve(district);
      return { district, lat, lon };
    } catch (err) {
      if (err instanceof GeocodeFailure && err.unreachable) {
        throw new ExternalServiceFailure('geocoder', err.reasons.join('; '));
      }
      if (err instanceof GeocodeFailure) {
        return reply.status(404).send({ district, lat: null, lon: null, error: err.message });
      }
      throw err;
    }
  });
}
