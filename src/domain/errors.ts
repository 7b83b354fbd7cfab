/**
 * Application error types.
 * Each error type maps to one HTTP status code and one `code` string returned to clients.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or wrong API key (401 Unauthorized)
 */
export class UnauthorizedError extends AppError {
  constructor(message = 'Missing or invalid API key') {
    super(message, 'UNAUTHORIZED', 401);
  }
}

/**
 * Malformed or oversized submission (400 Bad Request)
 */
export class BadRequestError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'BAD_REQUEST', 400, details);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Operation not allowed in the job's current state (409 Conflict)
 */
export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFLICT', 409, details);
  }
}

/**
 * Result requested before the job finished (425 Too Early)
 */
export class NotReadyError extends AppError {
  constructor(jobId: string, status: string) {
    super(`Job ${jobId} is not finished (status: ${status})`, 'NOT_READY', 425, { jobId, status });
  }
}

/**
 * Job ended in terminal failure (422 Unprocessable Entity)
 */
export class JobFailedError extends AppError {
  constructor(jobId: string, stage: string | null, reason: string) {
    super(`Job ${jobId} failed: ${reason}`, 'JOB_FAILED', 422, { jobId, stage, reason });
  }
}

/**
 * Object store or state store unreachable after retries (503 Service Unavailable)
 */
export class UnavailableError extends AppError {
  constructor(
    public readonly dependency: 'object-store' | 'state-store',
    message: string,
    details?: unknown
  ) {
    super(message, 'UNAVAILABLE', 503, { dependency, ...(isRecord(details) ? details : {}) });
  }
}

/**
 * Job id collision on create
 */
export class AlreadyExistsError extends AppError {
  constructor(jobId: string) {
    super(`Job with id ${jobId} already exists`, 'ALREADY_EXISTS', 409, { jobId });
  }
}

/**
 * Compare-and-swap lost against a concurrent writer
 */
export class StaleStateError extends AppError {
  constructor(jobId: string, expected: string) {
    super(`Job ${jobId} is no longer in status ${expected}`, 'STALE_STATE', 409, {
      jobId,
      expected,
    });
  }
}

/**
 * Another worker holds an unexpired lease
 */
export class LeaseHeldError extends AppError {
  constructor(jobId: string) {
    super(`Job ${jobId} is leased by another worker`, 'LEASE_HELD', 409, { jobId });
  }
}

/**
 * Job cannot be leased in its current state (terminal, cancelled, backing off, awaiting reclaim)
 */
export class JobNotEligibleError extends AppError {
  constructor(jobId: string, reason: string) {
    super(`Job ${jobId} is not eligible for dispatch: ${reason}`, 'JOB_NOT_ELIGIBLE', 409, {
      jobId,
      reason,
    });
  }
}

/**
 * Invalid status transition attempted inside the service
 */
export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Invalid job status transition: ${from} -> ${to}`, 'INVALID_TRANSITION', 409, {
      from,
      to,
    });
  }
}

/**
 * Failure raised by a pipeline stage
 */
export class StageError extends AppError {
  constructor(
    public readonly stage: string,
    message: string,
    details?: unknown
  ) {
    super(message, 'STAGE_ERROR', 500, details);
  }
}

/**
 * Stage exceeded its time limit
 */
export class StageTimeoutError extends AppError {
  constructor(stage: string, timeoutMs: number) {
    super(`Stage ${stage} timed out after ${timeoutMs}ms`, 'STAGE_TIMEOUT', 504, {
      stage,
      timeoutMs,
    });
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
