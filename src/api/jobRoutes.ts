import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { pipeline } from 'node:stream/promises';
import { z } from 'zod';
import { BadRequestError } from '../domain/errors.js';
import type { JobService, UrlSubmission } from '../services/JobService.js';
import { logger } from '../infra/logger.js';
import { mapJobToResponse } from './jobMapper.js';

export const FILENAME_HEADER = 'x-filename';

const sourceSubmissionSchema = z.object({
  sourceUrl: z.string().url(),
  filename: z.string().min(1).optional(),
});

function parseSourceSubmission(body: Buffer): UrlSubmission {
  let payload: unknown;
  try {
    payload = JSON.parse(body.toString('utf-8'));
  } catch {
    throw new BadRequestError('Request body is not valid JSON');
  }
  const parsed = sourceSubmissionSchema.safeParse(payload);
  if (!parsed.success) {
    throw new BadRequestError('Invalid source submission payload', parsed.error.flatten());
  }
  return parsed.data;
}

/**
 * Jobs route handler
 * HTTP layer only: validation of content and state lives in JobService
 */
export function createJobRouter(
  jobService: JobService,
  options: { stageNames: string[]; maxUploadBytes: number }
): Router {
  const router = Router();
  const rawBody = express.raw({ type: () => true, limit: options.maxUploadBytes });

  /**
   * POST /api/jobs
   * Raw document body; Content-Type text/plain or text/markdown, optional X-Filename.
   * With Content-Type application/json: { sourceUrl, filename? } to fetch the document instead.
   */
  router.post('/', rawBody, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const job = req.is('application/json')
        ? await jobService.submitFromUrl(parseSourceSubmission(body))
        : await jobService.submit({
            body,
            contentType: req.get('content-type') ?? '',
            filename: req.get(FILENAME_HEADER),
          });
      res.status(201).json({ job: mapJobToResponse(job, options.stageNames) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId
   */
  router.get('/:jobId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = await jobService.getStatus(req.params.jobId);
      res.json({ job: mapJobToResponse(job, options.stageNames) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId/result
   */
  router.get('/:jobId/result', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await jobService.getResult(req.params.jobId);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/jobs/:jobId/result/content
   */
  router.get(
    '/:jobId/result/content',
    async (req: Request, res: Response, next: NextFunction) => {
      let opened: Awaited<ReturnType<JobService['openResult']>>;
      try {
        opened = await jobService.openResult(req.params.jobId);
      } catch (error) {
        next(error);
        return;
      }

      res.status(200);
      res.setHeader('Content-Type', 'text/markdown; charset=utf-8');
      res.setHeader('Content-Length', String(opened.result.sizeBytes));
      try {
        await pipeline(opened.stream, res);
      } catch (error) {
        logger.warn('Result stream interrupted', {
          jobId: opened.result.jobId,
          error: error instanceof Error ? error.message : String(error),
        });
        res.destroy();
      }
    }
  );

  /**
   * POST /api/jobs/:jobId/cancel
   */
  router.post('/:jobId/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = await jobService.cancel(req.params.jobId);
      res.json({ job: mapJobToResponse(job, options.stageNames) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
