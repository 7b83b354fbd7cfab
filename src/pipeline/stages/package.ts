import { createHash } from 'node:crypto';
import { StageError } from '../../domain/errors.js';
import { extractTitle } from '../markdown.js';
import type { BookPackage } from '../manifest.js';
import type { PipelineStage } from '../PipelineStage.js';

/**
 * Bundles the Markdown with its metadata and checksum as one JSON artifact.
 */
export const packageStage: PipelineStage = {
  name: 'package',
  artifactExtension: 'json',

  async run(input, context) {
    const bytes = await context.objectStore.get(input.artifactRef);
    const markdown = bytes.toString('utf-8');
    const title = extractTitle(markdown);
    if (title === null) {
      throw new StageError('package', 'Document has no title line');
    }

    const bundle: BookPackage = {
      jobId: input.jobId,
      title,
      productCode: input.params.productCode,
      filename: input.params.filename,
      sourceContentType: input.params.contentType,
      sizeBytes: bytes.byteLength,
      sha256: createHash('sha256').update(bytes).digest('hex'),
      markdown,
    };

    context.signal.throwIfAborted();
    await context.objectStore.put(
      context.artifactKey,
      Buffer.from(JSON.stringify(bundle), 'utf-8'),
      'application/json; charset=utf-8'
    );
    return { artifactRef: context.artifactKey };
  },
};
