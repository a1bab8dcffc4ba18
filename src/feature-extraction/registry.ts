/**
 * Feature Registry
 *
 * Builds features from their configured name, parameters and smoothing.
 */
import { AnalysisError } from '../errors';
import type { ComponentParams } from '../params';
import { resolveSmoothing } from '../signal-processing/smoothing';
import type { SmoothingSpec } from '../signal-processing/types';
import { createEpspFeature } from './epsp';
import { createFiberVolleyFeature } from './fiber-volley';
import { createPopSpikeFeature } from './pop-spike';
import type { Feature, FeatureConfig, FeatureName } from './types';

type FeatureFactory = (params: ComponentParams, smoothing: Readonly<SmoothingSpec>) => Feature;

const FEATURE_FACTORIES: Record<FeatureName, FeatureFactory> = {
  fiber_volley: createFiberVolleyFeature,
  epsp: createEpspFeature,
  pop_spike: createPopSpikeFeature,
};

export const FEATURE_NAMES = Object.keys(FEATURE_FACTORIES).sort();

export function isFeatureName(name: string): name is FeatureName {
  return Object.prototype.hasOwnProperty.call(FEATURE_FACTORIES, name);
}

/**
 * Build a feature, resolving its smoothing against the pipeline default.
 *
 * @throws AnalysisError (unknownComponent) for an unregistered name,
 *   (missingParameter) or (invalidParameter) for bad parameters
 */
export function buildFeature(config: FeatureConfig, pipelineSmoothing: SmoothingSpec): Feature {
  if (!isFeatureName(config.name)) {
    throw new AnalysisError({
      type: 'unknownComponent',
      kind: 'feature',
      name: config.name,
      available: FEATURE_NAMES,
    });
  }

  const smoothing = resolveSmoothing(config.smoothing, pipelineSmoothing);
  return FEATURE_FACTORIES[config.name](config.params ?? {}, smoothing);
}
