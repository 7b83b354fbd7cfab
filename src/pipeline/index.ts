import type { PipelineStage } from './PipelineStage.js';
import { ingestStage } from './stages/ingest.js';
import { convertStage } from './stages/convert.js';
import { validateStage } from './stages/validate.js';
import { packageStage } from './stages/package.js';
import { publishStage } from './stages/publish.js';

export type { PipelineStage, StageContext, StageInput, StageResult } from './PipelineStage.js';
export { workArtifactKey } from './PipelineStage.js';
export { ingestStage, convertStage, validateStage, packageStage, publishStage };

/**
 * Default book pipeline: ingest → convert → validate → package → publish
 */
export function createBookPipeline(): PipelineStage[] {
  return [ingestStage, convertStage, validateStage, packageStage, publishStage];
}
