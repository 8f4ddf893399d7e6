/**
 * @fileoverview Application-specific error classes for standardized error handling.
 * Pipeline failures (geocoding, external services) are converted into failed
 * district results by the district processor; the rest surface to the caller.
 */

/**
 * Base application error class.
 */
export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public isOperational = true
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid input data.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public details?: unknown
  ) {
    super(400, 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

/**
 * A job submission that cannot be started (no districts, unknown preset, bad filters).
 * The active job, if any, is left untouched.
 */
export class InvalidJobSpecError extends AppError {
  constructor(
    message: string,
    public details?: unknown
  ) {
    super(400, 'INVALID_JOB_SPEC', message);
    this.name = 'InvalidJobSpecError';
  }
}

/**
 * A job operation was requested while no job is active, or for a job that
 * is no longer the active one.
 */
export class NoActiveJobError extends AppError {
  constructor(message = 'No active job') {
    super(409, 'NO_ACTIVE_JOB', message);
    this.name = 'NoActiveJobError';
  }
}

/** One HTTP attempt made by the retrying client. */
export interface AttemptRecord {
  attempt: number;
  outcome: 'success' | 'transient' | 'fatal';
  status: number | null;
  durationMs: number;
  error: string | null;
}

/**
 * An external service could not be reached or refused the request.
 * `status` is the last HTTP status seen, null when no response arrived.
 */
export class ExternalServiceFailure extends AppError {
  constructor(
    public service: string,
    message: string,
    public status: number | null = null,
    public attempts: AttemptRecord[] = []
  ) {
    super(502, 'EXTERNAL_SERVICE_FAILURE', `${service}: ${message}`);
    this.name = 'ExternalServiceFailure';
  }

  /** True when the service answered with a definite 404. */
  get isNotFound(): boolean {
    return this.status === 404;
  }
}

/**
 * A district could not be located, or the geocoder answer was ambiguous.
 * `unreachable` is set when no provider gave an answer at all.
 */
export class GeocodeFailure extends AppError {
  constructor(
    public district: string,
    public reasons: string[],
    public unreachable = false
  ) {
    super(
      404,
      'GEOCODE_FAILURE',
      `Could not geocode district: ${district}${reasons.length ? ` (${reasons.join('; ')})` : ''}`
    );
    this.name = 'GeocodeFailure';
  }
}

/**
 * Database operation error.
 */
export class DatabaseError extends AppError {
  constructor(operation: string, cause?: Error) {
    super(503, 'DATABASE_ERROR', `Database operation failed: ${operation}`);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Standardized error response format.
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    requestId?: string;
    details?: unknown;
  };
}

/**
 * HTTP failure classification result.
 */
export interface HttpFailureClassification {
  isRetryable: boolean;
  reason: string;
}

/**
 * Classifies an HTTP status from an external service.
 * Rate limiting, request timeouts and server errors are worth retrying;
 * any other client error will fail the same way on every attempt.
 */
export function classifyHttpStatus(status: number): HttpFailureClassification {
  if (status === 429) {
    return { isRetryable: true, reason: 'Rate limited by upstream service' };
  }

  if (status === 408) {
    return { isRetryable: true, reason: 'Upstream request timeout' };
  }

  if (status >= 500) {
    return { isRetryable: true, reason: `Upstream server error (HTTP ${status})` };
  }

  if (status === 404) {
    return { isRetryable: false, reason: 'Not found' };
  }

  return { isRetryable: false, reason: `Request rejected (HTTP ${status})` };
}

/**
 * Classifies an error thrown by fetch itself (no HTTP response).
 * Aborts from our own timeout and network-level failures are transient.
 */
export function classifyTransportError(err: unknown): HttpFailureClassification {
  if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
    return { isRetryable: true, reason: 'Request timeout' };
  }

  const cause = causeOf(err);
  const code = hasCode(err) ? err.code : hasCode(cause) ? cause.code : '';

  if (['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNRESET', 'EAI_AGAIN', 'UND_ERR_SOCKET'].includes(code)) {
    return { isRetryable: true, reason: `Connection error (${code})` };
  }

  // fetch reports every network failure as a bare TypeError
  if (err instanceof TypeError) {
    return { isRetryable: true, reason: `Connection error (${err.message})` };
  }

  return { isRetryable: false, reason: err instanceof Error ? err.message : String(err) };
}

function causeOf(err: unknown): unknown {
  return err instanceof Error ? err.cause : undefined;
}

function hasCode(err: unknown): err is { code: string } {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

/**
 * Human-readable description of any thrown value.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error && err.message.trim()) {
    return err.message.trim();
  }
  if (typeof err === 'string' && err.trim()) {
    return err.trim();
  }
  return 'Unknown error';
}
