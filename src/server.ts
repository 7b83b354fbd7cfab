import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createRedisClient } from './infra/redis.js';
import { S3ObjectStore } from './infra/S3ObjectStore.js';
import { RedisJobRepository } from './infra/repositories/RedisJobRepository.js';
import { createBookPipeline } from './pipeline/index.js';
import { PipelineEngine } from './services/PipelineEngine.js';
import { JobService } from './services/JobService.js';
import { HealthService } from './services/HealthService.js';
import { WorkerPool } from './scheduler/WorkerPool.js';
import { LeaseReaper } from './scheduler/LeaseReaper.js';
import { createApp } from './app.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

// Infrastructure adapters
const redis = createRedisClient(env);
const objectStore = S3ObjectStore.fromEnv(env);
const jobRepo = new RedisJobRepository(redis, {
  keyPrefix: env.REDIS_KEY_PREFIX,
  retentionMs: env.JOB_RETENTION_HOURS * 60 * 60 * 1000,
  retryAttempts: env.STORE_RETRY_ATTEMPTS,
});

// Unreachable dependencies at boot are fatal; after boot they are retried
try {
  await redis.connect();
  await jobRepo.ping();
  await objectStore.ping();
} catch (error) {
  loggerInstance.error('Startup dependency check failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  redis.disconnect();
  process.exit(1);
}

const stages = createBookPipeline();
const leaseTtlMs = env.LEASE_TTL_SECONDS * 1000;

const engine = new PipelineEngine(jobRepo, objectStore, stages, {
  stageTimeoutMs: env.STAGE_TIMEOUT_SECONDS * 1000,
  leaseTtlMs,
  maxAttempts: env.STAGE_MAX_ATTEMPTS,
  backoffBaseMs: env.RETRY_BACKOFF_BASE_MS,
  backoffMaxMs: env.RETRY_BACKOFF_MAX_MS,
});
const jobService = new JobService(
  jobRepo,
  objectStore,
  env.MAX_UPLOAD_BYTES,
  env.SOURCE_FETCH_TIMEOUT_MS
);
const healthService = new HealthService(jobRepo, objectStore, env.HEALTH_TIMEOUT_MS);

const workerPool = new WorkerPool(jobRepo, engine, {
  size: env.WORKER_POOL_SIZE,
  pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
  leaseTtlMs,
});
const reaper = new LeaseReaper(jobRepo, engine, env.REAPER_CRON);

const app = createApp({
  env,
  jobService,
  healthService,
  stageNames: stages.map((stage) => stage.name),
});

const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    stages: stages.map((stage) => stage.name),
  });

  workerPool.start();
  reaper.start();
});

// Graceful shutdown
let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  loggerInstance.info(`${signal} received, shutting down gracefully`);

  reaper.stop();
  server.close();
  await workerPool.stop();
  await redis.quit();
  loggerInstance.info('Server closed');
  process.exit(0);
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      loggerInstance.error('Shutdown failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  });
}

export { app };
