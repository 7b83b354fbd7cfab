import { ReplyError, type Redis } from 'ioredis';
import { z } from 'zod';
import { isTerminal, type Job, type JobStatus } from '../../domain/entities/Job.js';
import {
  AlreadyExistsError,
  JobNotEligibleError,
  LeaseHeldError,
  NotFoundError,
  StaleStateError,
  UnavailableError,
  isAppError,
} from '../../domain/errors.js';
import { logger } from '../logger.js';
import { withRetry } from '../retry.js';
import type { CompareAndSwapOptions, JobRepository } from './JobRepository.js';

/**
 * Hash layout: every field is a string, null is stored as ''.
 * Timestamps are epoch milliseconds so Lua can compare them.
 */
type JobHash = Record<string, string>;

const nullableString = z.string().transform((value) => (value === '' ? null : value));
const epochMs = z.string().regex(/^\d+$/).transform((value) => new Date(Number(value)));
const nullableEpochMs = z
  .string()
  .transform((value) => (value === '' ? null : new Date(Number(value))));

const jobHashSchema = z.object({
  id: z.string().min(1),
  status: z.enum(['queued', 'running', 'succeeded', 'failed', 'cancelled']),
  stageIndex: z.coerce.number().int().min(0),
  inputRef: z.string(),
  workingRef: nullableString,
  outputRef: nullableString,
  error: nullableString,
  failedStage: nullableString,
  attemptCount: z.coerce.number().int().min(0),
  createdAt: epochMs,
  updatedAt: epochMs,
  leaseOwner: nullableString,
  leaseExpiresAt: nullableEpochMs,
  notBefore: nullableEpochMs,
  filename: z.string(),
  contentType: z.string(),
  productCode: nullableString,
  sizeBytes: z.coerce.number().int().min(0),
});

function toMs(date: Date | null): string {
  return date ? String(date.getTime()) : '';
}

export function serializeJob(job: Job): JobHash {
  return {
    id: job.id,
    status: job.status,
    stageIndex: String(job.stageIndex),
    inputRef: job.inputRef,
    workingRef: job.workingRef ?? '',
    outputRef: job.outputRef ?? '',
    error: job.error ?? '',
    failedStage: job.failedStage ?? '',
    attemptCount: String(job.attemptCount),
    createdAt: toMs(job.createdAt),
    updatedAt: toMs(job.updatedAt),
    leaseOwner: job.leaseOwner ?? '',
    leaseExpiresAt: toMs(job.leaseExpiresAt),
    notBefore: toMs(job.notBefore),
    filename: job.filename,
    contentType: job.contentType,
    productCode: job.productCode ?? '',
    sizeBytes: String(job.sizeBytes),
  };
}

export function deserializeJob(hash: JobHash): Job {
  return jobHashSchema.parse(hash);
}

function flatten(hash: JobHash): string[] {
  return Object.entries(hash).flat();
}

const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('HSET', KEYS[1], unpack(ARGV, 3))
redis.call('ZADD', KEYS[2], ARGV[2], ARGV[1])
return 1
`;

const CAS_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return -1 end
if redis.call('HGET', KEYS[1], 'status') ~= ARGV[1] then return 0 end
if ARGV[2] ~= '' and redis.call('HGET', KEYS[1], 'leaseOwner') ~= ARGV[2] then return 0 end
if ARGV[3] ~= '' and redis.call('HGET', KEYS[1], 'leaseExpiresAt') ~= ARGV[3] then return 0 end
local id = ARGV[4]
local nextStatus = ARGV[5]
redis.call('ZREM', KEYS[2], id)
redis.call('ZREM', KEYS[3], id)
redis.call('ZREM', KEYS[4], id)
redis.call('HSET', KEYS[1], unpack(ARGV, 10))
if nextStatus == 'queued' then
  local delayUntil = tonumber(ARGV[9])
  if delayUntil > 0 then
    redis.call('ZADD', KEYS[4], delayUntil, id)
  else
    redis.call('ZADD', KEYS[2], ARGV[6], id)
  end
end
if nextStatus == 'running' then redis.call('ZADD', KEYS[3], ARGV[7], id) end
local retentionMs = tonumber(ARGV[8])
if retentionMs > 0 then redis.call('PEXPIRE', KEYS[1], retentionMs) end
return 1
`;

const LEASE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return {-1, 'missing'} end
local owner = ARGV[1]
local now = tonumber(ARGV[2])
local expiresAt = ARGV[3]
local id = ARGV[4]
local status = redis.call('HGET', KEYS[1], 'status')
if status == 'queued' then
  local notBefore = redis.call('HGET', KEYS[1], 'notBefore')
  if notBefore and notBefore ~= '' and tonumber(notBefore) > now then
    return {3, 'retry backoff has not elapsed'}
  end
  redis.call('HSET', KEYS[1], 'status', 'running', 'leaseOwner', owner,
    'leaseExpiresAt', expiresAt, 'updatedAt', ARGV[2], 'notBefore', '')
  redis.call('ZREM', KEYS[2], id)
  redis.call('ZREM', KEYS[4], id)
  redis.call('ZADD', KEYS[3], expiresAt, id)
  return {1, 'leased'}
end
if status == 'running' then
  local currentOwner = redis.call('HGET', KEYS[1], 'leaseOwner')
  local currentExpiry = tonumber(redis.call('HGET', KEYS[1], 'leaseExpiresAt')) or 0
  if currentOwner == owner then
    redis.call('HSET', KEYS[1], 'leaseExpiresAt', expiresAt, 'updatedAt', ARGV[2])
    redis.call('ZADD', KEYS[3], expiresAt, id)
    return {1, 'extended'}
  end
  if currentExpiry > now then return {2, 'held'} end
  return {3, 'lease expired and awaiting reclaim'}
end
return {3, 'status is ' .. status}
`;

const RENEW_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then return -1 end
if redis.call('HGET', KEYS[1], 'status') ~= 'running' then return 0 end
if redis.call('HGET', KEYS[1], 'leaseOwner') ~= ARGV[1] then return 0 end
redis.call('HSET', KEYS[1], 'leaseExpiresAt', ARGV[2], 'updatedAt', ARGV[3])
redis.call('ZADD', KEYS[2], ARGV[2], ARGV[4])
return 1
`;

// Moves due entries of the backoff set into the queue, then reads the queue head.
const DISPATCH_SCRIPT = `
local limit = tonumber(ARGV[2])
local due = redis.call('ZRANGEBYSCORE', KEYS[2], '-inf', ARGV[1], 'LIMIT', 0, limit)
for _, id in ipairs(due) do
  redis.call('ZREM', KEYS[2], id)
  local jobKey = ARGV[3] .. id
  if redis.call('HGET', jobKey, 'status') == 'queued' then
    redis.call('ZADD', KEYS[1], redis.call('HGET', jobKey, 'createdAt'), id)
  end
end
return redis.call('ZRANGE', KEYS[1], 0, limit - 1)
`;

const idListSchema = z.array(z.string());

type RedisJobRepositoryOptions = {
  keyPrefix: string;
  retentionMs: number;
  retryAttempts: number;
  retryBaseDelayMs?: number;
};

/**
 * Transient Redis failures: anything that is not a server reply or one of our own errors
 */
export function isTransientRedisError(error: unknown): boolean {
  if (isAppError(error) || error instanceof ReplyError || error instanceof z.ZodError) {
    return false;
  }
  return error instanceof Error;
}

export class RedisJobRepository implements JobRepository {
  private readonly keyPrefix: string;
  private readonly retentionMs: number;
  private readonly retryAttempts: number;
  private readonly retryBaseDelayMs: number;

  constructor(
    private redis: Redis,
    options: RedisJobRepositoryOptions
  ) {
    this.keyPrefix = options.keyPrefix;
    this.retentionMs = options.retentionMs;
    this.retryAttempts = options.retryAttempts;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 100;
  }

  async create(job: Job): Promise<void> {
    const created = await this.run('create', () =>
      this.redis.eval(
        CREATE_SCRIPT,
        2,
        this.jobKey(job.id),
        this.queueKey(),
        job.id,
        job.createdAt.getTime(),
        ...flatten(serializeJob(job))
      )
    );
    if (created !== 1) {
      // A retried create lands here when the first attempt was applied but its reply was lost.
      const stored = await this.run('create', () => this.redis.hgetall(this.jobKey(job.id)));
      if (!isSameRecord(stored, job)) {
        throw new AlreadyExistsError(job.id);
      }
      logger.warn('Job record already written by an earlier attempt', { jobId: job.id });
      return;
    }
    logger.debug('Job record created', { jobId: job.id });
  }

  async get(id: string): Promise<Job> {
    const hash = await this.run('get', () => this.redis.hgetall(this.jobKey(id)));
    if (Object.keys(hash).length === 0) {
      throw new NotFoundError('Job', id);
    }
    return deserializeJob(hash);
  }

  async compareAndSwapStatus(
    id: string,
    expectedStatus: JobStatus,
    next: Job,
    options: CompareAndSwapOptions = {}
  ): Promise<Job> {
    const retentionMs = isTerminal(next.status) ? this.retentionMs : 0;
    const notBeforeMs = next.notBefore ? next.notBefore.getTime() : 0;
    const delayUntil = next.status === 'queued' && notBeforeMs > Date.now() ? notBeforeMs : 0;
    const result = await this.run('compareAndSwapStatus', () =>
      this.redis.eval(
        CAS_SCRIPT,
        4,
        this.jobKey(id),
        this.queueKey(),
        this.runningKey(),
        this.delayedKey(),
        expectedStatus,
        options.leaseOwner ?? '',
        options.leaseExpiresAt ? options.leaseExpiresAt.getTime() : '',
        id,
        next.status,
        next.createdAt.getTime(),
        next.leaseExpiresAt ? next.leaseExpiresAt.getTime() : 0,
        retentionMs,
        delayUntil,
        ...flatten(serializeJob(next))
      )
    );

    if (result === -1) {
      throw new NotFoundError('Job', id);
    }
    if (result !== 1) {
      throw new StaleStateError(id, expectedStatus);
    }
    logger.debug('Job record swapped', { jobId: id, from: expectedStatus, to: next.status });
    return next;
  }

  async acquireLease(id: string, owner: string, ttlMs: number): Promise<Job> {
    const now = Date.now();
    const result = await this.run('acquireLease', () =>
      this.redis.eval(
        LEASE_SCRIPT,
        4,
        this.jobKey(id),
        this.queueKey(),
        this.runningKey(),
        this.delayedKey(),
        owner,
        now,
        now + ttlMs,
        id
      )
    );

    const [code, reason] = parseLeaseReply(result);
    if (code === -1) throw new NotFoundError('Job', id);
    if (code === 2) throw new LeaseHeldError(id);
    if (code !== 1) throw new JobNotEligibleError(id, reason);
    return this.get(id);
  }

  async renewLease(id: string, owner: string, ttlMs: number): Promise<void> {
    const now = Date.now();
    const result = await this.run('renewLease', () =>
      this.redis.eval(RENEW_SCRIPT, 2, this.jobKey(id), this.runningKey(), owner, now + ttlMs, now, id)
    );

    if (result === -1) throw new NotFoundError('Job', id);
    if (result !== 1) throw new StaleStateError(id, 'running');
  }

  async listDispatchable(limit: number): Promise<string[]> {
    const reply = await this.run('listDispatchable', () =>
      this.redis.eval(
        DISPATCH_SCRIPT,
        2,
        this.queueKey(),
        this.delayedKey(),
        Date.now(),
        Math.max(1, limit),
        this.jobKey('')
      )
    );
    return idListSchema.parse(reply);
  }

  async listExpiredLeases(now: Date, limit: number): Promise<Job[]> {
    const ids = await this.run('listExpiredLeases', () =>
      this.redis.zrangebyscore(this.runningKey(), '-inf', `(${now.getTime()}`, 'LIMIT', 0, limit)
    );

    const jobs: Job[] = [];
    for (const id of ids) {
      try {
        jobs.push(await this.get(id));
      } catch (error) {
        if (!(error instanceof NotFoundError)) throw error;
        logger.warn('Dropping running index entry for missing job', { jobId: id });
        await this.run('zrem', () => this.redis.zrem(this.runningKey(), id));
      }
    }
    return jobs;
  }

  async ping(): Promise<void> {
    try {
      await this.redis.ping();
    } catch (error) {
      throw new UnavailableError('state-store', 'State store did not answer', {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private jobKey(id: string): string {
    return `${this.keyPrefix}job:${id}`;
  }

  private queueKey(): string {
    return `${this.keyPrefix}queue`;
  }

  private runningKey(): string {
    return `${this.keyPrefix}running`;
  }

  private delayedKey(): string {
    return `${this.keyPrefix}delayed`;
  }

  private run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      attempts: this.retryAttempts,
      baseDelayMs: this.retryBaseDelayMs,
      isTransient: isTransientRedisError,
      label: `state-store ${operation}`,
      onExhausted: (error) =>
        new UnavailableError('state-store', `State store unavailable during ${operation}`, {
          cause: error instanceof Error ? error.message : String(error),
        }),
    });
  }
}

function isSameRecord(stored: JobHash, job: Job): boolean {
  return (
    stored.id === job.id &&
    stored.createdAt === String(job.createdAt.getTime()) &&
    stored.inputRef === job.inputRef
  );
}

function parseLeaseReply(reply: unknown): [number, string] {
  if (Array.isArray(reply) && typeof reply[0] === 'number') {
    return [reply[0], typeof reply[1] === 'string' ? reply[1] : 'unknown'];
  }
  throw new Error(`Unexpected lease script reply: ${JSON.stringify(reply)}`);
}
