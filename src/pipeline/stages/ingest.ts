import { StageError } from '../../domain/errors.js';
import { normalizeNewlines } from '../markdown.js';
import type { PipelineStage } from '../PipelineStage.js';

/**
 * Decodes the submitted bytes as UTF-8 and normalises line endings.
 */
export const ingestStage: PipelineStage = {
  name: 'ingest',
  artifactExtension: 'txt',

  async run(input, context) {
    const raw = await context.objectStore.get(input.artifactRef);

    let text: string;
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(raw);
    } catch {
      throw new StageError('ingest', 'Input is not valid UTF-8', { inputRef: input.artifactRef });
    }

    context.signal.throwIfAborted();
    await context.objectStore.put(
      context.artifactKey,
      Buffer.from(normalizeNewlines(text), 'utf-8'),
      'text/plain; charset=utf-8'
    );
    return { artifactRef: context.artifactKey };
  },
};
