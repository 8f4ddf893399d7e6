/**
 * @fileoverview Job routes. A client starts a job, then calls the step
 * endpoint repeatedly, each call processing one district, until the job
 * reports completion.
 */

import type { FastifyInstance } from 'fastify';
import { exportFilename, formatResultsCsv } from '../services/export.js';
import type { JobController } from '../services/job-controller.js';
import { AppError, ValidationError } from '../utils/errors.js';
import { advanceJobSchema, startJobSchema } from '../utils/validation.js';

export interface JobsRoutesOptions {
  jobs: JobController;
  /** Clock for download filenames */
  now?: () => Date;
}

/**
 * Registers job routes with the Fastify instance.
 *
 * Routes:
 * - POST /jobs - Start a job, replacing any existing one
 * - POST /jobs/step - Process the next district
 * - GET /jobs/current - Job status
 * - GET /jobs/results - Results so far
 * - GET /jobs/download - Results as a CSV attachment
 * - POST /jobs/reset - Discard the job
 *
 * @example
 * await fastify.register(jobsRoutes, { jobs });
 */
export async function jobsRoutes(fastify: FastifyInstance, options: JobsRoutesOptions) {
  const { jobs } = options;
  const now = options.now ?? (() => new Date());

  /**
   * POST /jobs
   * Body: districts (list, or a comma/newline separated string), optional
   * preset, radius_m, max_assign_m, top_n and custom filter fields.
   */
  fastify.post('/jobs', async (request, reply) => {
    const parsed = startJobSchema.safeParse(request.body);
    if (!parsed.success) {
      throw new ValidationError('Invalid request body', parsed.error.flatten());
    }

    const started = await jobs.start(parsed.data);
    return reply.status(201).send({
      ...started,
      message: `Job started with ${started.total_districts} district(s)`,
    });
  });

  /**
   * POST /jobs/step
   * Runs the full pipeline for the next district. Blocks for the duration of
   * that district's external calls.
   */
  fastify.post('/jobs/step', async (request) => {
    const parsed = advanceJobSchema.safeParse(request.body ?? undefined);
    if (!parsed.success) {
      throw new ValidationError('Invalid request body', parsed.error.flatten());
    }

    return jobs.advance(parsed.data?.job_id);
  });

  fastify.get('/jobs/current', async () => jobs.status());

  fastify.get('/jobs/results', async () => {
    const { job_id, results } = jobs.results();
    return { job_id, results };
  });

  /**
   * GET /jobs/download
   * CSV of the results produced so far.
   */
  fastify.get('/jobs/download', async (_request, reply) => {
    const status = jobs.status();
    const snapshot = status.state === 'idle' ? null : jobs.results();
    if (!snapshot || snapshot.results.length === 0) {
      throw new AppError(400, 'NO_RESULTS', 'No results to download');
    }

    return reply
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="${exportFilename(now())}"`)
      .send(formatResultsCsv(snapshot.results, snapshot.top_n));
  });

  fastify.post('/jobs/reset', async () => {
    await jobs.reset();
    return { message: 'Job reset' };
  });
}
