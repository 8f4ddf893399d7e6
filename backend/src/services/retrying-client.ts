/**
 * @fileoverview HTTP client with bounded retries, exponential backoff and jitter,
 * composed with a per-service RateLimiter.
 *
 * Every attempt, first or retry, takes a rate-limit token first. Transient
 * failures (timeouts, connection errors, 408, 429, 5xx, unparseable bodies,
 * bodies rejected by `inspect`) are retried after `backoffBaseMs * 2^attempt + jitter`; other client errors
 * fail at once.
 */

import { systemClock, type Clock } from '../utils/async.js';
import {
  ExternalServiceFailure,
  classifyHttpStatus,
  classifyTransportError,
  type AttemptRecord,
} from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import type { RateLimiter } from './rate-limiter.js';

export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers?: Record<string, string>;
  body?: string;
  /**
   * Checks a successful body for a failure the server reported in-band.
   * A returned reason makes the attempt transient.
   */
  inspect?: (body: unknown) => string | null;
}

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxAttempts: number;
  backoffBaseMs: number;
  /** Upper bound (exclusive) of the random delay added to each backoff */
  jitterMs: number;
  /** Per-attempt timeout */
  timeoutMs: number;
}

export interface RetryingClientOptions {
  service: string;
  limiter: RateLimiter;
  policy: RetryPolicy;
  logger: Logger;
  /** Headers sent with every request (e.g. User-Agent) */
  headers?: Record<string, string>;
  fetch?: typeof fetch;
  clock?: Clock;
  random?: () => number;
}

export interface RetryingClientStats {
  requests: number;
  attempts: number;
  retries: number;
  failures: number;
}

type AttemptOutcome =
  | { kind: 'success'; status: number; body: unknown }
  | { kind: 'transient' | 'fatal'; status: number | null; reason: string };

export class RetryingClient {
  readonly service: string;
  private readonly limiter: RateLimiter;
  private readonly policy: RetryPolicy;
  private readonly logger: Logger;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly counters: RetryingClientStats = { requests: 0, attempts: 0, retries: 0, failures: 0 };

  constructor(options: RetryingClientOptions) {
    if (options.policy.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be at least 1 for ${options.service}`);
    }
    this.service = options.service;
    this.limiter = options.limiter;
    this.policy = options.policy;
    this.logger = options.logger.child({ service: options.service });
    this.headers = options.headers ?? {};
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  /**
   * Sends the request and resolves with the parsed JSON body of the first
   * successful response.
   *
   * @throws {ExternalServiceFailure} on a non-retryable status, or once every attempt has failed
   */
  async execute(request: HttpRequest): Promise<unknown> {
    const { maxAttempts } = this.policy;
    const attempts: AttemptRecord[] = [];
    let lastStatus: number | null = null;
    let lastReason = 'No attempt made';

    this.counters.requests++;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      await this.limiter.acquire();
      this.counters.attempts++;

      const started = this.clock.now();
      const outcome = await this.attemptOnce(request);
      const durationMs = this.clock.now() - started;

      if (outcome.kind === 'success') {
        attempts.push({ attempt, outcome: 'success', status: outcome.status, durationMs, error: null });
        this.logger.debug({ attempt, status: outcome.status, durationMs }, 'Request succeeded');
        return outcome.body;
      }

      attempts.push({ attempt, outcome: outcome.kind, status: outcome.status, durationMs, error: outcome.reason });
      lastStatus = outcome.status;
      lastReason = outcome.reason;

      if (outcome.kind === 'fatal') {
        this.counters.failures++;
        this.logger.warn({ attempt, status: outcome.status, reason: outcome.reason }, 'Request failed, not retrying');
        throw new ExternalServiceFailure(this.service, outcome.reason, outcome.status, attempts);
      }

      if (attempt < maxAttempts) {
        const delayMs = this.backoffDelay(attempt);
        this.counters.retries++;
        this.logger.warn(
          { attempt, maxAttempts, status: outcome.status, reason: outcome.reason, delayMs },
          'Transient failure, retrying'
        );
        await this.clock.sleep(delayMs);
      }
    }

    this.counters.failures++;
    this.logger.error({ attempts: maxAttempts, status: lastStatus, reason: lastReason }, 'Retries exhausted');
    throw new ExternalServiceFailure(
      this.service,
      `${lastReason} (after ${maxAttempts} attempts)`,
      lastStatus,
      attempts
    );
  }

  /**
   * Delay before the attempt following `attempt` (1-based).
   */
  backoffDelay(attempt: number): number {
    const jitter = this.random() * this.policy.jitterMs;
    return Math.floor(this.policy.backoffBaseMs * 2 ** attempt + jitter);
  }

  stats(): RetryingClientStats {
    return { ...this.counters };
  }

  private async attemptOnce(request: HttpRequest): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.policy.timeoutMs);

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: { Accept: 'application/json', ...this.headers, ...request.headers },
        body: request.body,
        signal: controller.signal,
      });

      if (!response.ok) {
        const classification = classifyHttpStatus(response.status);
        // Drain the body so the connection can be reused
        await response.arrayBuffer().catch(() => undefined);
        return {
          kind: classification.isRetryable ? 'transient' : 'fatal',
          status: response.status,
          reason: classification.reason,
        };
      }

      try {
        const body: unknown = await response.json();
        const failure = request.inspect?.(body) ?? null;
        if (failure !== null) {
          return { kind: 'transient', status: response.status, reason: failure };
        }
        return { kind: 'success', status: response.status, body };
      } catch (err) {
        const timedOut = err instanceof Error && err.name === 'AbortError';
        return {
          kind: 'transient',
          status: response.status,
          reason: timedOut ? 'Request timeout' : 'Malformed JSON response',
        };
      }
    } catch (err) {
      const classification = classifyTransportError(err);
      return {
        kind: classification.isRetryable ? 'transient' : 'fatal',
        status: null,
        reason: classification.reason,
      };
    } finally {
      // Always clear timeout to prevent resource leak
      clearTimeout(timeoutId);
    }
  }
}
