import { StageError } from '../../domain/errors.js';
import { extractTitle } from '../markdown.js';
import type { PipelineStage } from '../PipelineStage.js';

/**
 * Rejects documents with no content or no usable title line. Passes the artifact through.
 */
export const validateStage: PipelineStage = {
  name: 'validate',
  artifactExtension: 'md',

  async run(input, context) {
    const markdown = (await context.objectStore.get(input.artifactRef)).toString('utf-8');

    if (markdown.trim().length === 0) {
      throw new StageError('validate', 'Document is empty after conversion');
    }
    if (extractTitle(markdown) === null) {
      throw new StageError('validate', 'Document has no title line');
    }

    return { artifactRef: input.artifactRef };
  },
};
