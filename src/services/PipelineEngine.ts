import { assertJobTransition, withoutLease, type Job } from '../domain/entities/Job.js';
import { StageTimeoutError, StaleStateError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { ObjectStore } from '../infra/ObjectStore.js';
import type {
  CompareAndSwapOptions,
  JobRepository,
} from '../infra/repositories/JobRepository.js';
import { computeBackoffMs, withTimeout } from '../infra/retry.js';
import { workArtifactKey, type PipelineStage } from '../pipeline/PipelineStage.js';

export type PipelineEngineOptions = {
  stageTimeoutMs: number;
  leaseTtlMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
};

export type RunOutcome = 'succeeded' | 'failed' | 'retrying' | 'abandoned' | 'lease-lost';

type StageAttempt =
  | { kind: 'completed'; artifactRef: string }
  | { kind: 'timed-out' }
  | { kind: 'failed'; error: unknown };

/**
 * PipelineEngine - drives one leased job through the ordered stages.
 * Progress is persisted after every stage, so a later run resumes at `stageIndex`.
 */
export class PipelineEngine {
  constructor(
    private jobRepo: JobRepository,
    private objectStore: ObjectStore,
    private stages: PipelineStage[],
    private options: PipelineEngineOptions
  ) {}

  stageNameAt(index: number): string {
    return this.stages[index]?.name ?? `stage-${index}`;
  }

  async run(leased: Job, owner: string): Promise<RunOutcome> {
    let job = leased;
    const heartbeat = this.startHeartbeat(job.id, owner);

    try {
      while (job.stageIndex < this.stages.length) {
        const stage = this.stages[job.stageIndex];
        const attempt = await this.attemptStage(job, stage);

        if (attempt.kind === 'timed-out') {
          // Stop renewing; the reaper picks the job up once the lease lapses.
          heartbeat.stop();
          logger.warn('Stage abandoned after timeout', {
            jobId: job.id,
            stage: stage.name,
            timeoutMs: this.options.stageTimeoutMs,
          });
          return 'abandoned';
        }

        if (attempt.kind === 'failed') {
          return await this.recordFailure(job, owner, stage.name, formatFailureReason(attempt.error));
        }

        job = await this.advance(job, owner, attempt.artifactRef);
        logger.info('Stage completed', {
          jobId: job.id,
          stage: stage.name,
          stageIndex: job.stageIndex,
        });
      }

      await this.complete(job, owner);
      return 'succeeded';
    } catch (error) {
      if (error instanceof StaleStateError) {
        logger.warn('Lease lost while running job', { jobId: job.id, owner });
        return 'lease-lost';
      }
      throw error;
    } finally {
      heartbeat.stop();
    }
  }

  /**
   * Applies the retry policy to a failed attempt: back to `queued` with backoff,
   * or `failed` once the attempt limit is reached.
   */
  async recordFailure(
    job: Job,
    owner: string,
    stageName: string,
    reason: string,
    guard: CompareAndSwapOptions = { leaseOwner: owner }
  ): Promise<'failed' | 'retrying'> {
    const attemptCount = job.attemptCount + 1;
    const now = new Date();

    if (attemptCount >= this.options.maxAttempts) {
      assertJobTransition(job.status, 'failed');
      await this.jobRepo.compareAndSwapStatus(
        job.id,
        'running',
        {
          ...withoutLease(job),
          status: 'failed',
          attemptCount,
          error: `${stageName}: ${reason}`,
          failedStage: stageName,
          notBefore: null,
          updatedAt: now,
        },
        guard
      );
      logger.error('Job failed', { jobId: job.id, stage: stageName, attemptCount, reason });
      return 'failed';
    }

    const delayMs = computeBackoffMs(
      attemptCount,
      this.options.backoffBaseMs,
      this.options.backoffMaxMs
    );
    assertJobTransition(job.status, 'queued');
    await this.jobRepo.compareAndSwapStatus(
      job.id,
      'running',
      {
        ...withoutLease(job),
        status: 'queued',
        attemptCount,
        notBefore: new Date(now.getTime() + delayMs),
        updatedAt: now,
      },
      guard
    );
    logger.warn('Stage attempt failed, job requeued', {
      jobId: job.id,
      stage: stageName,
      attemptCount,
      delayMs,
      reason,
    });
    return 'retrying';
  }

  private async attemptStage(job: Job, stage: PipelineStage): Promise<StageAttempt> {
    const controller = new AbortController();
    const artifactKey = workArtifactKey(job.id, job.stageIndex, stage);

    try {
      const result = await withTimeout(
        stage.run(
          {
            jobId: job.id,
            artifactRef: job.workingRef ?? job.inputRef,
            params: {
              filename: job.filename,
              contentType: job.contentType,
              productCode: job.productCode,
            },
          },
          { objectStore: this.objectStore, signal: controller.signal, artifactKey }
        ),
        this.options.stageTimeoutMs,
        () => {
          const timeoutError = new StageTimeoutError(stage.name, this.options.stageTimeoutMs);
          controller.abort(timeoutError);
          return timeoutError;
        }
      );
      return { kind: 'completed', artifactRef: result.artifactRef };
    } catch (error) {
      if (error instanceof StageTimeoutError) {
        return { kind: 'timed-out' };
      }
      logger.warn('Stage threw', {
        jobId: job.id,
        stage: stage.name,
        error: formatFailureReason(error),
      });
      return { kind: 'failed', error };
    }
  }

  private async advance(job: Job, owner: string, artifactRef: string): Promise<Job> {
    assertJobTransition(job.status, 'running');
    const now = new Date();
    return this.jobRepo.compareAndSwapStatus(
      job.id,
      'running',
      {
        ...job,
        stageIndex: job.stageIndex + 1,
        workingRef: artifactRef,
        attemptCount: 0,
        leaseExpiresAt: new Date(now.getTime() + this.options.leaseTtlMs),
        updatedAt: now,
      },
      { leaseOwner: owner }
    );
  }

  private async complete(job: Job, owner: string): Promise<void> {
    assertJobTransition(job.status, 'succeeded');
    const outputRef = job.workingRef ?? job.inputRef;
    await this.jobRepo.compareAndSwapStatus(
      job.id,
      'running',
      {
        ...withoutLease(job),
        status: 'succeeded',
        outputRef,
        workingRef: null,
        error: null,
        failedStage: null,
        notBefore: null,
        updatedAt: new Date(),
      },
      { leaseOwner: owner }
    );
    logger.info('Job succeeded', { jobId: job.id, outputRef });
    await this.removeIntermediates(job.id, outputRef);
  }

  private async removeIntermediates(jobId: string, outputRef: string): Promise<void> {
    const keys = this.stages
      .slice(0, -1)
      .map((stage, index) => workArtifactKey(jobId, index, stage))
      .filter((key) => key !== outputRef);

    const results = await Promise.allSettled(keys.map((key) => this.objectStore.delete(key)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.warn('Failed to delete intermediate artifact', {
          jobId,
          key: keys[index],
          error: formatFailureReason(result.reason),
        });
      }
    });
  }

  private startHeartbeat(jobId: string, owner: string): { stop: () => void } {
    const intervalMs = Math.max(10, Math.floor(this.options.leaseTtlMs / 3));
    const timer = setInterval(() => {
      this.jobRepo.renewLease(jobId, owner, this.options.leaseTtlMs).catch((error: unknown) => {
        logger.warn('Lease renewal failed', {
          jobId,
          owner,
          error: formatFailureReason(error),
        });
      });
    }, intervalMs);
    timer.unref();

    return { stop: () => clearInterval(timer) };
  }
}

export function formatFailureReason(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return 'Unexpected error';
}
