import { InvalidTransitionError } from '../errors.js';

/**
 * Job entity - one submitted book and its progress through the pipeline.
 * The state store holds the authoritative copy; this is the in-process view of it.
 */
export type JobStatus = 'queued' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export const TERMINAL_STATUSES: readonly JobStatus[] = ['succeeded', 'failed', 'cancelled'];

export interface Job {
  id: string;
  status: JobStatus;
  stageIndex: number;
  inputRef: string;
  /** Latest intermediate artifact; input of the stage at `stageIndex`. */
  workingRef: string | null;
  outputRef: string | null;
  error: string | null;
  failedStage: string | null;
  attemptCount: number;
  createdAt: Date;
  updatedAt: Date;
  leaseOwner: string | null;
  leaseExpiresAt: Date | null;
  notBefore: Date | null;
  filename: string;
  contentType: string;
  productCode: string | null;
  sizeBytes: number;
}

export const jobTransitions: Record<JobStatus, JobStatus[]> = {
  queued: ['running', 'cancelled'],
  running: ['running', 'queued', 'succeeded', 'failed'],
  succeeded: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return jobTransitions[from].includes(to);
}

export function assertJobTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function hasLiveLease(job: Job, now: Date = new Date()): boolean {
  return (
    job.leaseOwner !== null &&
    job.leaseExpiresAt !== null &&
    job.leaseExpiresAt.getTime() > now.getTime()
  );
}

const PRODUCT_CODE_PATTERN = /^(\d{6}-\d{2})/;

/**
 * Product codes prefix catalogue filenames, e.g. `100227-01-some-title.md`
 */
export function extractProductCode(filename: string): string | null {
  const match = PRODUCT_CODE_PATTERN.exec(filename);
  return match ? match[1] : null;
}

/**
 * Factory function to create a new queued Job
 */
export function createJob(params: {
  id: string;
  inputRef: string;
  filename: string;
  contentType: string;
  sizeBytes: number;
  now?: Date;
}): Job {
  const now = params.now ?? new Date();
  return {
    id: params.id,
    status: 'queued',
    stageIndex: 0,
    inputRef: params.inputRef,
    workingRef: null,
    outputRef: null,
    error: null,
    failedStage: null,
    attemptCount: 0,
    createdAt: now,
    updatedAt: now,
    leaseOwner: null,
    leaseExpiresAt: null,
    notBefore: null,
    filename: params.filename,
    contentType: params.contentType,
    productCode: extractProductCode(params.filename),
    sizeBytes: params.sizeBytes,
  };
}

/**
 * Returns a copy of the job with the lease fields cleared
 */
export function withoutLease(job: Job): Job {
  return { ...job, leaseOwner: null, leaseExpiresAt: null };
}
