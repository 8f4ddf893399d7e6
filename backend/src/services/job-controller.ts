/**
 * @fileoverview Holds the active job and drives it one district at a time.
 *
 * States:
 * - idle: no job
 * - running: cursor < districts.length
 * - completed: cursor === districts.length
 *
 * start, advance and reset run under one mutex, so two overlapping advance
 * calls can never process the same district. Status reads are lock-free
 * snapshots.
 */

import { randomUUID } from 'node:crypto';
import type { Preset } from '../config.js';
import type { AnalysisParams, DistrictResult, PoiFilters } from '../types.js';
import { Mutex } from '../utils/async.js';
import { InvalidJobSpecError, NoActiveJobError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import {
  DISTRICT_PATTERN,
  MAX_DISTRICTS_PER_JOB,
  parseDistricts,
  type StartJobRequest,
} from '../utils/validation.js';

export type JobState = 'idle' | 'running' | 'completed';

export interface DistrictRunner {
  process(district: string, params: AnalysisParams): Promise<DistrictResult>;
}

export interface JobDefaults {
  radiusM: number;
  maxAssignM: number;
  topN: number;
}

interface Job {
  id: string;
  districts: readonly string[];
  params: AnalysisParams;
  preset: string;
  createdAt: Date;
  cursor: number;
  results: DistrictResult[];
}

export interface JobStarted {
  job_id: string;
  total_districts: number;
}

export interface AdvanceOutcome {
  completed: boolean;
  processed: number;
  total: number;
  /** Present only when this call processed a district */
  result?: DistrictResult;
}

export interface JobStatus {
  state: JobState;
  job_id: string | null;
  processed: number;
  total: number;
  completed: boolean;
  preset: string | null;
  created_at: string | null;
}

export interface JobResults {
  job_id: string;
  top_n: number;
  results: DistrictResult[];
}

export const CUSTOM_PRESET = 'custom';

export interface JobControllerOptions {
  runner: DistrictRunner;
  presets: Readonly<Record<string, Preset>>;
  defaults: JobDefaults;
  logger: Logger;
  generateId?: () => string;
  now?: () => Date;
}

export class JobController {
  private job: Job | null = null;
  private readonly mutex = new Mutex();
  private readonly runner: DistrictRunner;
  private readonly presets: Readonly<Record<string, Preset>>;
  private readonly defaults: JobDefaults;
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(options: JobControllerOptions) {
    this.runner = options.runner;
    this.presets = options.presets;
    this.defaults = options.defaults;
    this.logger = options.logger.child({ component: 'job-controller' });
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Replaces any existing job with a new one. An invalid request leaves the
   * current job untouched.
   *
   * @throws {InvalidJobSpecError} on an empty district list, an unknown preset or a malformed district
   */
  async start(request: StartJobRequest): Promise<JobStarted> {
    const districts = parseDistricts(request.districts);
    if (districts.length === 0) {
      throw new InvalidJobSpecError('At least one district is required');
    }
    if (districts.length > MAX_DISTRICTS_PER_JOB) {
      throw new InvalidJobSpecError(
        `Too many districts: ${districts.length} (maximum ${MAX_DISTRICTS_PER_JOB})`
      );
    }

    const invalid = districts.filter((d) => !DISTRICT_PATTERN.test(d));
    if (invalid.length > 0) {
      throw new InvalidJobSpecError('Invalid district codes', { districts: invalid });
    }

    const presetName = request.preset ?? CUSTOM_PRESET;
    const params: AnalysisParams = {
      radius_m: request.radius_m ?? this.defaults.radiusM,
      max_assign_m: request.max_assign_m ?? this.defaults.maxAssignM,
      top_n: request.top_n ?? this.defaults.topN,
      filters: this.resolveFilters(presetName, request),
    };

    return this.mutex.runExclusive(() => {
      const job: Job = {
        id: this.generateId(),
        districts,
        params,
        preset: presetName,
        createdAt: this.now(),
        cursor: 0,
        results: [],
      };

      if (this.job) {
        this.logger.info({ jobId: this.job.id }, 'Discarding previous job');
      }
      this.job = job;
      this.logger.info(
        { jobId: job.id, districts: districts.length, preset: presetName, radiusM: params.radius_m },
        'Job started'
      );

      return { job_id: job.id, total_districts: districts.length };
    });
  }

  /**
   * Processes the next district. Once every district is done, further calls
   * return the completion state without doing any work.
   *
   * @param jobId - When given, must name the active job
   * @throws {NoActiveJobError} when idle, or when jobId is not the active job
   */
  advance(jobId?: string): Promise<AdvanceOutcome> {
    return this.mutex.runExclusive(async () => {
      const job = this.requireJob(jobId);
      const total = job.districts.length;

      if (job.cursor >= total) {
        return { completed: true, processed: job.cursor, total };
      }

      const district = job.districts[job.cursor];
      const result = await this.runner.process(district, job.params);

      job.results.push(result);
      job.cursor++;

      const completed = job.cursor === total;
      this.logger.info(
        { jobId: job.id, district, success: result.success, processed: job.cursor, total },
        completed ? 'Job completed' : 'District step finished'
      );

      return { completed, processed: job.cursor, total, result };
    });
  }

  status(): JobStatus {
    const job = this.job;
    if (!job) {
      return {
        state: 'idle',
        job_id: null,
        processed: 0,
        total: 0,
        completed: false,
        preset: null,
        created_at: null,
      };
    }

    const completed = job.cursor === job.districts.length;
    return {
      state: completed ? 'completed' : 'running',
      job_id: job.id,
      processed: job.cursor,
      total: job.districts.length,
      completed,
      preset: job.preset,
      created_at: job.createdAt.toISOString(),
    };
  }

  /**
   * Results produced so far, in submission order.
   *
   * @throws {NoActiveJobError} when idle
   */
  results(): JobResults {
    const job = this.requireJob();
    return { job_id: job.id, top_n: job.params.top_n, results: [...job.results] };
  }

  /**
   * Discards the active job. Waits for an in-flight advance to finish first.
   */
  reset(): Promise<void> {
    return this.mutex.runExclusive(() => {
      if (this.job) {
        this.logger.info({ jobId: this.job.id, processed: this.job.cursor }, 'Job reset');
      }
      this.job = null;
    });
  }

  private requireJob(jobId?: string): Job {
    if (!this.job) {
      throw new NoActiveJobError();
    }
    if (jobId !== undefined && jobId !== this.job.id) {
      throw new NoActiveJobError(`Job ${jobId} is not the active job`);
    }
    return this.job;
  }

  private resolveFilters(presetName: string, request: StartJobRequest): PoiFilters {
    const preset = Object.hasOwn(this.presets, presetName) ? this.presets[presetName] : undefined;
    if (!preset) {
      throw new InvalidJobSpecError(`Unknown preset: ${presetName}`, {
        available: Object.keys(this.presets),
      });
    }

    if (presetName !== CUSTOM_PRESET) {
      return {
        include_all_shops: preset.include_all_shops,
        shop_types: [...preset.shop_types],
        amenities: [...preset.amenities],
        property_selectors: [...preset.property_selectors],
      };
    }

    // Omitted fields select nothing; the query builder falls back to all
    // shops when no selector is left
    return {
      include_all_shops: request.include_all_shops ?? false,
      shop_types: [...(request.shop_types ?? [])],
      amenities: [...(request.amenities ?? [])],
      property_selectors: [...(request.property_selectors ?? [])],
    };
  }
}
