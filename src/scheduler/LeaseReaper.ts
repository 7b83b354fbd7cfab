import cron, { type ScheduledTask } from 'node-cron';
import { StaleStateError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';
import type { PipelineEngine } from '../services/PipelineEngine.js';

export type ReapResult = { requeued: number; failed: number; skipped: number };

/**
 * LeaseReaper - returns jobs whose worker died or gave up to the queue.
 * Each reclaim counts as a failed attempt of the stage the job was on.
 */
export class LeaseReaper {
  private task: ScheduledTask | null = null;
  private isReaping = false;

  constructor(
    private jobRepo: JobRepository,
    private engine: PipelineEngine,
    private cronExpression: string,
    private batchSize = 100
  ) {}

  start(): void {
    if (!cron.validate(this.cronExpression)) {
      throw new Error(`Invalid REAPER_CRON expression: ${this.cronExpression}`);
    }

    this.task = cron.schedule(this.cronExpression, async () => {
      await this.tick();
    });

    logger.info('LeaseReaper started', { cronExpression: this.cronExpression });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('LeaseReaper stopped');
    }
  }

  async reapExpired(now: Date = new Date()): Promise<ReapResult> {
    const result: ReapResult = { requeued: 0, failed: 0, skipped: 0 };
    const expired = await this.jobRepo.listExpiredLeases(now, this.batchSize);

    for (const job of expired) {
      if (job.leaseOwner === null || job.leaseExpiresAt === null) {
        result.skipped += 1;
        continue;
      }

      const stageName = this.engine.stageNameAt(job.stageIndex);
      try {
        const outcome = await this.engine.recordFailure(
          job,
          job.leaseOwner,
          stageName,
          'lease expired before the stage completed',
          { leaseOwner: job.leaseOwner, leaseExpiresAt: job.leaseExpiresAt }
        );
        if (outcome === 'failed') {
          result.failed += 1;
        } else {
          result.requeued += 1;
        }
        logger.info('Reclaimed expired lease', {
          jobId: job.id,
          previousOwner: job.leaseOwner,
          stage: stageName,
          outcome,
        });
      } catch (error) {
        if (!(error instanceof StaleStateError)) throw error;
        // Renewed or finished between listing and swap
        result.skipped += 1;
      }
    }

    return result;
  }

  private async tick(): Promise<void> {
    if (this.isReaping) {
      logger.debug('Reaper run skipped - previous run still active');
      return;
    }

    this.isReaping = true;
    try {
      const result = await this.reapExpired();
      if (result.requeued + result.failed > 0) {
        logger.info('Reaper run finished', result);
      }
    } catch (error) {
      logger.error('Reaper run failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.isReaping = false;
    }
  }
}
