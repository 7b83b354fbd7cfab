import { Router } from 'express';
import { createJobRouter } from './jobRoutes.js';
import { requireApiKey } from './auth.js';
import type { JobService } from '../services/JobService.js';

/**
 * Main API router - every route below requires the API key
 */
export function createApiRouter(deps: {
  jobService: JobService;
  apiKey: string;
  stageNames: string[];
  maxUploadBytes: number;
}): Router {
  const router = Router();

  router.use(requireApiKey(deps.apiKey));
  router.use(
    '/jobs',
    createJobRouter(deps.jobService, {
      stageNames: deps.stageNames,
      maxUploadBytes: deps.maxUploadBytes,
    })
  );

  return router;
}
