import { Redis } from 'ioredis';
import type { Env } from './env.js';
import { logger } from './logger.js';

/**
 * Shared Redis connection for the job store.
 * Commands fail fast while disconnected; the client keeps reconnecting in the background.
 */
export function createRedisClient(env: Env): Redis {
  const client = new Redis({
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    db: env.REDIS_DB,
    password: env.REDIS_PASSWORD,
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    connectTimeout: 5000,
    retryStrategy: (times) => Math.min(times * 200, 5000),
  });

  client.on('error', (error: Error) => {
    logger.warn('Redis connection error', { error: error.message });
  });
  client.on('ready', () => {
    logger.info('Redis connection ready', {
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      db: env.REDIS_DB,
    });
  });

  return client;
}
