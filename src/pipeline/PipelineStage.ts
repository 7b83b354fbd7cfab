import type { ObjectStore } from '../infra/ObjectStore.js';

export type StageParams = {
  filename: string;
  contentType: string;
  productCode: string | null;
};

export type StageInput = {
  jobId: string;
  artifactRef: string;
  params: StageParams;
};

export type StageResult = {
  artifactRef: string;
};

export interface StageContext {
  objectStore: ObjectStore;
  /** Fires when the engine abandons the stage after a timeout. */
  signal: AbortSignal;
  /** Key this stage should write its output to. */
  artifactKey: string;
}

/**
 * One transformation step. Stages read their input artifact and write a new one;
 * a thrown error fails the attempt.
 */
export interface PipelineStage {
  readonly name: string;
  /** Extension of the artifact written under the work area. */
  readonly artifactExtension: string;
  run(input: StageInput, context: StageContext): Promise<StageResult>;
}

export function workArtifactKey(jobId: string, index: number, stage: PipelineStage): string {
  const ordinal = String(index + 1).padStart(2, '0');
  return `work/${jobId}/${ordinal}-${stage.name}.${stage.artifactExtension}`;
}
