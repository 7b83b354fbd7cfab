import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Job } from '../domain/entities/Job.js';
import { JobNotEligibleError, LeaseHeldError, NotFoundError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';
import type { PipelineEngine, RunOutcome } from '../services/PipelineEngine.js';

export type WorkerPoolOptions = {
  size: number;
  pollIntervalMs: number;
  leaseTtlMs: number;
  /** Queued ids fetched per poll; candidates are tried in FIFO order. */
  batchSize?: number;
};

/**
 * WorkerPool - bounded set of polling workers.
 * Workers share nothing in process; ownership of a job is the lease in the job store.
 */
export class WorkerPool {
  private running = false;
  private loops: Promise<void>[] = [];
  private readonly instanceId = `${hostname()}-${process.pid}-${randomUUID().slice(0, 8)}`;

  constructor(
    private jobRepo: JobRepository,
    private engine: PipelineEngine,
    private options: WorkerPoolOptions
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  workerId(index: number): string {
    return `${this.instanceId}-w${index}`;
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    for (let index = 0; index < this.options.size; index++) {
      this.loops.push(this.loop(this.workerId(index)));
    }

    logger.info('WorkerPool started', {
      size: this.options.size,
      pollIntervalMs: this.options.pollIntervalMs,
      instanceId: this.instanceId,
    });
  }

  /**
   * Stops polling and waits for in-flight jobs to finish their current stage run
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await Promise.all(this.loops);
    this.loops = [];
    logger.info('WorkerPool stopped');
  }

  /**
   * Leases the oldest eligible job and runs it. Returns null when nothing was dispatchable.
   */
  async runOnce(workerId: string): Promise<{ jobId: string; outcome: RunOutcome } | null> {
    const job = await this.claimNext(workerId);
    if (!job) return null;

    logger.info('Job leased', { jobId: job.id, workerId, stageIndex: job.stageIndex });
    const outcome = await this.engine.run(job, workerId);
    logger.info('Job run finished', { jobId: job.id, workerId, outcome });
    return { jobId: job.id, outcome };
  }

  private async claimNext(workerId: string): Promise<Job | null> {
    const batchSize = this.options.batchSize ?? Math.max(10, this.options.size * 4);
    const candidates = await this.jobRepo.listDispatchable(batchSize);

    for (const id of candidates) {
      try {
        return await this.jobRepo.acquireLease(id, workerId, this.options.leaseTtlMs);
      } catch (error) {
        if (
          error instanceof LeaseHeldError ||
          error instanceof JobNotEligibleError ||
          error instanceof NotFoundError
        ) {
          continue;
        }
        throw error;
      }
    }
    return null;
  }

  private async loop(workerId: string): Promise<void> {
    while (this.running) {
      let worked = false;
      try {
        worked = (await this.runOnce(workerId)) !== null;
      } catch (error) {
        logger.error('Worker iteration failed', {
          workerId,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      if (!worked && this.running) {
        await sleep(this.options.pollIntervalMs);
      }
    }
  }
}
