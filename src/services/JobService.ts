import { randomUUID } from 'node:crypto';
import type { Readable } from 'node:stream';
import {
  assertJobTransition,
  createJob,
  hasLiveLease,
  type Job,
} from '../domain/entities/Job.js';
import {
  BadRequestError,
  ConflictError,
  JobFailedError,
  NotReadyError,
  StaleStateError,
  isAppError,
} from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { ObjectStore } from '../infra/ObjectStore.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';

export const ACCEPTED_CONTENT_TYPES = ['text/plain', 'text/markdown', 'text/x-markdown'];

export type Submission = {
  body: Buffer;
  contentType: string;
  filename?: string;
};

export type UrlSubmission = {
  sourceUrl: string;
  filename?: string;
};

export type JobResult = {
  jobId: string;
  outputRef: string;
  sizeBytes: number;
};

function baseContentType(contentType: string): string {
  return contentType.split(';', 1)[0].trim().toLowerCase();
}

const EXTENSION_CONTENT_TYPES: Record<string, string> = {
  md: 'text/markdown',
  markdown: 'text/markdown',
  txt: 'text/plain',
};

/**
 * Servers often label markdown as octet-stream; fall back to the file extension
 */
function sourceContentType(header: string | null, filename: string): string {
  if (header && ACCEPTED_CONTENT_TYPES.includes(baseContentType(header))) {
    return header;
  }
  const extension = filename.split('.').pop()?.toLowerCase() ?? '';
  return EXTENSION_CONTENT_TYPES[extension] ?? header ?? '';
}

export function parseSourceUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new BadRequestError('sourceUrl is not a valid URL');
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new BadRequestError(`Unsupported sourceUrl scheme: ${url.protocol}`);
  }
  return url;
}

/**
 * Reads a response body, stopping once it passes `limitBytes`. Returns null when it does.
 */
async function readBodyWithin(response: Response, limitBytes: number): Promise<Buffer | null> {
  if (!response.body) return Buffer.alloc(0);

  const reader = response.body.getReader();
  const chunks: Buffer[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    const chunk = Buffer.from(value);
    total += chunk.byteLength;
    if (total > limitBytes) {
      await reader.cancel();
      return null;
    }
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Filenames become part of object keys; keep them to one safe path segment
 */
export function sanitizeFilename(filename: string | undefined): string {
  const base = (filename ?? '').split(/[\\/]/).pop() ?? '';
  const cleaned = base.replace(/[^\w.\-]+/g, '_').replace(/^\.+/, '');
  return cleaned.length > 0 ? cleaned.slice(0, 200) : 'document.md';
}

/**
 * JobService - gateway-facing job operations
 */
export class JobService {
  constructor(
    private jobRepo: JobRepository,
    private objectStore: ObjectStore,
    private maxUploadBytes: number,
    private sourceFetchTimeoutMs = 30000
  ) {}

  async submit(submission: Submission): Promise<Job> {
    const contentType = baseContentType(submission.contentType);
    if (!ACCEPTED_CONTENT_TYPES.includes(contentType)) {
      throw new BadRequestError(`Unsupported content type: ${contentType || 'none'}`, {
        accepted: ACCEPTED_CONTENT_TYPES,
      });
    }
    if (submission.body.byteLength === 0) {
      throw new BadRequestError('Request body is empty');
    }
    if (submission.body.byteLength > this.maxUploadBytes) {
      throw new BadRequestError('Request body exceeds the upload limit', {
        limitBytes: this.maxUploadBytes,
      });
    }

    const id = randomUUID();
    const filename = sanitizeFilename(submission.filename);
    const inputRef = `inputs/${id}/${filename}`;

    await this.objectStore.put(inputRef, submission.body, submission.contentType);

    const job = createJob({
      id,
      inputRef,
      filename,
      contentType: submission.contentType,
      sizeBytes: submission.body.byteLength,
    });
    try {
      await this.jobRepo.create(job);
    } catch (error) {
      await this.objectStore.delete(inputRef).catch((cleanupError: unknown) => {
        logger.warn('Failed to delete input of unrecorded job', {
          jobId: id,
          inputRef,
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
      throw error;
    }

    logger.info('Job submitted', {
      jobId: job.id,
      filename,
      productCode: job.productCode,
      sizeBytes: job.sizeBytes,
    });
    return job;
  }

  /**
   * Downloads the document at `sourceUrl` and submits it like an upload
   */
  async submitFromUrl(submission: UrlSubmission): Promise<Job> {
    const url = parseSourceUrl(submission.sourceUrl);
    const filename = sanitizeFilename(submission.filename ?? url.pathname.split('/').pop());
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.sourceFetchTimeoutMs);

    let body: Buffer | null;
    let contentType: string;
    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) {
        throw new BadRequestError(`Source URL answered HTTP ${response.status}`, {
          sourceUrl: url.href,
          status: response.status,
        });
      }
      const declaredBytes = Number(response.headers.get('content-length') ?? 0);
      body =
        declaredBytes > this.maxUploadBytes
          ? null
          : await readBodyWithin(response, this.maxUploadBytes);
      contentType = sourceContentType(response.headers.get('content-type'), filename);
    } catch (error) {
      if (isAppError(error)) throw error;
      throw new BadRequestError('Source URL could not be fetched', {
        sourceUrl: url.href,
        cause: error instanceof Error ? error.message : String(error),
      });
    } finally {
      clearTimeout(timeout);
    }

    if (body === null) {
      throw new BadRequestError('Source document exceeds the upload limit', {
        sourceUrl: url.href,
        limitBytes: this.maxUploadBytes,
      });
    }

    logger.debug('Source document fetched', {
      sourceUrl: url.href,
      sizeBytes: body.byteLength,
    });
    return this.submit({ body, contentType, filename });
  }

  async getStatus(jobId: string): Promise<Job> {
    return this.jobRepo.get(jobId);
  }

  async getResult(jobId: string): Promise<JobResult> {
    const job = await this.jobRepo.get(jobId);

    switch (job.status) {
      case 'succeeded': {
        if (job.outputRef === null) {
          throw new Error(`Job ${job.id} succeeded without an output reference`);
        }
        const stored = await this.objectStore.head(job.outputRef);
        return { jobId: job.id, outputRef: job.outputRef, sizeBytes: stored.sizeBytes };
      }
      case 'failed':
        throw new JobFailedError(job.id, job.failedStage, job.error ?? 'Unknown failure');
      case 'cancelled':
        throw new ConflictError(`Job ${job.id} was cancelled`, { jobId: job.id, status: job.status });
      default:
        throw new NotReadyError(job.id, job.status);
    }
  }

  async openResult(jobId: string): Promise<{ result: JobResult; stream: Readable }> {
    const result = await this.getResult(jobId);
    const stream = await this.objectStore.stream(result.outputRef);
    return { result, stream };
  }

  /**
   * Cancels a job that no worker has leased yet
   */
  async cancel(jobId: string): Promise<Job> {
    const job = await this.jobRepo.get(jobId);

    if (job.status !== 'queued' || hasLiveLease(job)) {
      throw new ConflictError(`Job ${jobId} cannot be cancelled in status ${job.status}`, {
        jobId,
        status: job.status,
      });
    }

    assertJobTransition(job.status, 'cancelled');
    try {
      const cancelled = await this.jobRepo.compareAndSwapStatus(jobId, 'queued', {
        ...job,
        status: 'cancelled',
        notBefore: null,
        updatedAt: new Date(),
      });
      logger.info('Job cancelled', { jobId });
      return cancelled;
    } catch (error) {
      if (error instanceof StaleStateError) {
        throw new ConflictError(`Job ${jobId} was picked up by a worker`, { jobId });
      }
      throw error;
    }
  }
}
