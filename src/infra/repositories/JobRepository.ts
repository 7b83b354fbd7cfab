import type { Job, JobStatus } from '../../domain/entities/Job.js';

export type CompareAndSwapOptions = {
  /** When set, the stored lease owner must also match. */
  leaseOwner?: string;
  /** When set, the stored lease expiry must also match; guards reclaim against a concurrent renewal. */
  leaseExpiresAt?: Date;
};

/**
 * Job store contract. The backing store is the single source of truth for job status;
 * every status change goes through `compareAndSwapStatus` or `acquireLease`.
 */
export interface JobRepository {
  /** Throws AlreadyExistsError on id collision. */
  create(job: Job): Promise<void>;

  /** Throws NotFoundError if absent. */
  get(id: string): Promise<Job>;

  /**
   * Replaces the record with `next` only if the stored status equals `expectedStatus`.
   * Throws StaleStateError otherwise, NotFoundError if absent.
   */
  compareAndSwapStatus(
    id: string,
    expectedStatus: JobStatus,
    next: Job,
    options?: CompareAndSwapOptions
  ): Promise<Job>;

  /**
   * Leases a queued job (moving it to running) or extends the caller's own lease.
   * Throws LeaseHeldError, JobNotEligibleError or NotFoundError.
   */
  acquireLease(id: string, owner: string, ttlMs: number): Promise<Job>;

  /**
   * Pushes out the expiry of a lease the caller already holds. Never leases a queued job.
   * Throws StaleStateError when the job is not running under `owner`, NotFoundError if absent.
   */
  renewLease(id: string, owner: string, ttlMs: number): Promise<void>;

  /** Queued job ids past their backoff, oldest first, ties broken by id. */
  listDispatchable(limit: number): Promise<string[]>;

  /** Running jobs whose lease expired before `now`. */
  listExpiredLeases(now: Date, limit: number): Promise<Job[]>;

  ping(): Promise<void>;
}
