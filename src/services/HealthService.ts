import { UnavailableError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { ObjectStore } from '../infra/ObjectStore.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';
import { withTimeout } from '../infra/retry.js';

export type DependencyHealth = 'up' | 'down';

export type HealthReport = {
  status: 'ok' | 'unhealthy';
  checks: { stateStore: DependencyHealth; objectStore: DependencyHealth };
  timestamp: string;
};

/**
 * HealthService - liveness of both stores, each bounded by a short timeout
 */
export class HealthService {
  constructor(
    private jobRepo: JobRepository,
    private objectStore: ObjectStore,
    private timeoutMs: number
  ) {}

  async check(): Promise<HealthReport> {
    const [stateStore, objectStore] = await Promise.all([
      this.probe('state-store', () => this.jobRepo.ping()),
      this.probe('object-store', () => this.objectStore.ping()),
    ]);

    return {
      status: stateStore === 'up' && objectStore === 'up' ? 'ok' : 'unhealthy',
      checks: { stateStore, objectStore },
      timestamp: new Date().toISOString(),
    };
  }

  private async probe(
    dependency: 'state-store' | 'object-store',
    ping: () => Promise<void>
  ): Promise<DependencyHealth> {
    try {
      await withTimeout(
        ping(),
        this.timeoutMs,
        () => new UnavailableError(dependency, `${dependency} probe timed out`)
      );
      return 'up';
    } catch (error) {
      logger.warn('Health probe failed', {
        dependency,
        error: error instanceof Error ? error.message : String(error),
      });
      return 'down';
    }
  }
}
