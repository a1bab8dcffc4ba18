/**
 * Transforms Module
 *
 * Sweep-level corrections applied before averaging, and averaging itself.
 */

export { baselineCorrection, DEFAULT_BASELINE_WINDOW_MS } from './baseline';
export {
  cropStimArtifact,
  templateSubtractStimArtifact,
  DEFAULT_ARTIFACT_WINDOW_MS,
  MIN_TEMPLATE_ENERGY,
} from './stim-artifact';
export { averageSweeps } from './average';
export {
  buildTransform,
  isTransformName,
  TRANSFORM_NAMES,
  type TransformConfig,
  type TransformName,
  type TransformStep,
} from './registry';
