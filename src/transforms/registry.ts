/**
 * Transform Registry
 *
 * Builds transform steps from their configured name and parameters.
 */
import { z } from 'zod';
import { AnalysisError } from '../errors';
import { type ComponentParams, parseParams, type WindowMs, windowMsSchema } from '../params';
import { withAveraged, withSweeps } from '../recording/context';
import type { RecordingContext } from '../recording/types';
import { averageSweeps } from './average';
import { baselineCorrection, DEFAULT_BASELINE_WINDOW_MS } from './baseline';
import {
  cropStimArtifact,
  DEFAULT_ARTIFACT_WINDOW_MS,
  templateSubtractStimArtifact,
} from './stim-artifact';

export const TRANSFORM_NAMES = [
  'baseline_correction',
  'crop_stim_artifact',
  'template_subtract_stim_artifact',
  'average_sweeps',
] as const;

export type TransformName = (typeof TRANSFORM_NAMES)[number];

/**
 * Transform as written in a pipeline configuration.
 */
export interface TransformConfig {
  name: string;
  params?: ComponentParams;
}

/**
 * A configured transform, ready to run on a context.
 */
export interface TransformStep {
  readonly name: TransformName;
  apply(context: RecordingContext): RecordingContext;
}

const windowParamsSchema = z.object({ windowMs: windowMsSchema.optional() });

function windowParam(name: TransformName, params: ComponentParams, fallback: WindowMs): WindowMs {
  return parseParams(name, windowParamsSchema, params).windowMs ?? fallback;
}

const TRANSFORM_BUILDERS: Record<TransformName, (params: ComponentParams) => TransformStep> = {
  baseline_correction: (params) => {
    const windowMs = windowParam('baseline_correction', params, DEFAULT_BASELINE_WINDOW_MS);
    return {
      name: 'baseline_correction',
      apply: (context) => withSweeps(context, baselineCorrection(context.sweeps, windowMs)),
    };
  },
  crop_stim_artifact: (params) => {
    const windowMs = windowParam('crop_stim_artifact', params, DEFAULT_ARTIFACT_WINDOW_MS);
    return {
      name: 'crop_stim_artifact',
      apply: (context) => withSweeps(context, cropStimArtifact(context.sweeps, windowMs)),
    };
  },
  template_subtract_stim_artifact: (params) => {
    const windowMs = windowParam('template_subtract_stim_artifact', params, DEFAULT_ARTIFACT_WINDOW_MS);
    return {
      name: 'template_subtract_stim_artifact',
      apply: (context) => withSweeps(context, templateSubtractStimArtifact(context.sweeps, windowMs)),
    };
  },
  average_sweeps: () => ({
    name: 'average_sweeps',
    apply: (context) => withAveraged(context, averageSweeps(context.sweeps)),
  }),
};

export function isTransformName(name: string): name is TransformName {
  return (TRANSFORM_NAMES as readonly string[]).includes(name);
}

/**
 * Build a transform step from configuration.
 *
 * @throws AnalysisError (unknownComponent) for an unregistered name,
 *   (invalidParameter) for malformed parameters
 */
export function buildTransform(config: TransformConfig): TransformStep {
  if (!isTransformName(config.name)) {
    throw new AnalysisError({
      type: 'unknownComponent',
      kind: 'transform',
      name: config.name,
      available: [...TRANSFORM_NAMES].sort(),
    });
  }
  return TRANSFORM_BUILDERS[config.name](config.params ?? {});
}
