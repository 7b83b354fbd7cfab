import { cleanMarkdown } from '../markdown.js';
import type { PipelineStage } from '../PipelineStage.js';

export const convertStage: PipelineStage = {
  name: 'convert',
  artifactExtension: 'md',

  async run(input, context) {
    const text = (await context.objectStore.get(input.artifactRef)).toString('utf-8');
    context.signal.throwIfAborted();
    await context.objectStore.put(
      context.artifactKey,
      Buffer.from(cleanMarkdown(text), 'utf-8'),
      'text/markdown; charset=utf-8'
    );
    return { artifactRef: context.artifactKey };
  },
};
