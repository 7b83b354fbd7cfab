import express from 'express';
import cors from 'cors';
import type { Request, Response, NextFunction } from 'express';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { createRateLimiter } from './infra/rateLimiter.js';
import { logger } from './infra/logger.js';
import type { Env } from './infra/env.js';
import type { JobService } from './services/JobService.js';
import type { HealthService } from './services/HealthService.js';

export type AppDeps = {
  env: Pick<
    Env,
    'NODE_ENV' | 'API_KEY' | 'MAX_UPLOAD_BYTES' | 'RATE_LIMIT_WINDOW_MS' | 'RATE_LIMIT_MAX_REQUESTS'
  >;
  jobService: JobService;
  healthService: HealthService;
  stageNames: string[];
};

/**
 * Builds the Express application; server.ts wires the real adapters, tests wire stand-ins
 */
export function createApp(deps: AppDeps): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors());

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  // Health check endpoint, polled by the container runtime
  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const report = await deps.healthService.check();
      res.status(report.status === 'ok' ? 200 : 503).json(report);
    } catch (error) {
      next(error);
    }
  });

  app.use(
    '/api',
    createRateLimiter({
      windowMs: deps.env.RATE_LIMIT_WINDOW_MS,
      max: deps.env.RATE_LIMIT_MAX_REQUESTS,
    }),
    createApiRouter({
      jobService: deps.jobService,
      apiKey: deps.env.API_KEY,
      stageNames: deps.stageNames,
      maxUploadBytes: deps.env.MAX_UPLOAD_BYTES,
    })
  );

  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.env));

  return app;
}
