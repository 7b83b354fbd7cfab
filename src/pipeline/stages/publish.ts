import { z } from 'zod';
import { StageError } from '../../domain/errors.js';
import { bookPackageSchema, type BookManifest, type BookPackage } from '../manifest.js';
import type { PipelineStage } from '../PipelineStage.js';

export function publishedBookKey(jobId: string): string {
  return `published/${jobId}/book.md`;
}

export function publishedManifestKey(jobId: string): string {
  return `published/${jobId}/manifest.json`;
}

/**
 * Writes the final book and its manifest outside the work area.
 * The book key becomes the job's output reference.
 */
export const publishStage: PipelineStage = {
  name: 'publish',
  artifactExtension: 'md',

  async run(input, context) {
    const raw = (await context.objectStore.get(input.artifactRef)).toString('utf-8');

    let bundle: BookPackage;
    try {
      bundle = bookPackageSchema.parse(JSON.parse(raw));
    } catch (error) {
      const reason = error instanceof z.ZodError ? 'schema mismatch' : 'invalid JSON';
      throw new StageError('publish', `Package artifact is unreadable (${reason})`);
    }

    const { markdown, ...metadata } = bundle;
    const bookKey = publishedBookKey(input.jobId);
    const manifest: BookManifest = {
      ...metadata,
      markdownKey: bookKey,
      publishedAt: new Date().toISOString(),
    };

    context.signal.throwIfAborted();
    await context.objectStore.put(bookKey, Buffer.from(markdown, 'utf-8'), 'text/markdown; charset=utf-8');
    await context.objectStore.put(
      publishedManifestKey(input.jobId),
      Buffer.from(JSON.stringify(manifest, null, 2), 'utf-8'),
      'application/json; charset=utf-8'
    );
    return { artifactRef: bookKey };
  },
};
