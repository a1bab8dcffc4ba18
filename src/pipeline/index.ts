/**
 * Pipeline Module
 */

export {
  DEFAULT_PIPELINE_CONFIG,
  parsePipelineConfig,
  pipelineConfigSchema,
  smoothingSchema,
  type AcquisitionConfig,
  type PipelineConfig,
} from './config';
export { runContext, runRecordings, type AcquiredRecording, type SkippedFeature } from './pipeline';
