import type { Job } from '../domain/entities/Job.js';

export function mapJobToResponse(job: Job, stageNames: string[]) {
  return {
    id: job.id,
    status: job.status,
    stageIndex: job.stageIndex,
    stage: stageNames[job.stageIndex] ?? null,
    stageCount: stageNames.length,
    attemptCount: job.attemptCount,
    error: job.error,
    failedStage: job.failedStage,
    outputRef: job.outputRef,
    filename: job.filename,
    productCode: job.productCode,
    sizeBytes: job.sizeBytes,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
    retryAt: job.notBefore ? job.notBefore.toISOString() : null,
  };
}
