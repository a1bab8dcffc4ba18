/**
 * Pipeline Configuration
 *
 * Typed configuration for one analysis run and its validation from plain
 * values (e.g. parsed JSON).
 */
import { z } from 'zod';
import { invalidParameter } from '../errors';
import type { FeatureConfig } from '../feature-extraction/types';
import { formatIssues } from '../params';
import type { TransformConfig } from '../transforms/registry';
import { DEFAULT_SMOOTHING, type SmoothingSpec } from '../signal-processing/types';

// ============================================================================
// CONFIGURATION TYPES
// ============================================================================

/**
 * How acquired sweeps map onto stimulus intensities.
 */
export interface AcquisitionConfig {
  /** Intensities in acquisition order; each covers `repetitions` sweeps */
  stimIntensities: number[];
  /** Consecutive sweeps recorded per intensity */
  repetitions: number;
}

export interface PipelineConfig {
  /** Applied in order before features run */
  transforms: TransformConfig[];
  /** Computed in order; later features may read earlier results */
  features: FeatureConfig[];
  /** Smoothing for every feature that does not bring its own */
  smoothing: SmoothingSpec;
  acquisition?: AcquisitionConfig;
}

/**
 * Default configuration: baseline correction, artifact crop, averaging and
 * all three features with typical CA1 windows.
 */
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  transforms: [
    { name: 'baseline_correction', params: { windowMs: [0.0, 0.1] } },
    { name: 'crop_stim_artifact', params: { windowMs: [0.0, 1.25] } },
    { name: 'average_sweeps' },
  ],
  features: [
    { name: 'fiber_volley', params: { windowMs: [0.0, 1.5] } },
    { name: 'epsp', params: { windowMs: [1.5, 5.0], fitDistance: 4 } },
    { name: 'pop_spike', params: { lagMs: 3.0, prominence: 0.2, threshold: 0.05 } },
  ],
  smoothing: DEFAULT_SMOOTHING,
};

// ============================================================================
// SCHEMA
// ============================================================================

export const smoothingSchema = z.discriminatedUnion('method', [
  z.object({ method: z.literal('none') }),
  z.object({
    method: z.literal('moving_average'),
    windowSize: z.number().int().positive(),
  }),
  z.object({
    method: z.literal('savgol'),
    windowSize: z.number().int().positive(),
    polyOrder: z.number().int().nonnegative(),
  }),
  z.object({
    method: z.literal('butterworth_lowpass'),
    cutoffHz: z.number().positive(),
    order: z.number().int().positive().default(3),
  }),
]);

const paramsSchema = z.record(z.unknown()).default({});

export const pipelineConfigSchema = z.object({
  transforms: z.array(z.object({ name: z.string().min(1), params: paramsSchema })).default([]),
  features: z
    .array(
      z.object({
        name: z.string().min(1),
        params: paramsSchema,
        smoothing: smoothingSchema.optional(),
      })
    )
    .default([]),
  smoothing: smoothingSchema.default(DEFAULT_SMOOTHING),
  acquisition: z
    .object({
      stimIntensities: z.array(z.number().finite()).min(1),
      repetitions: z.number().int().positive().default(3),
    })
    .optional(),
});

/**
 * Validate a plain configuration object.
 *
 * Only shapes are checked here. Component names and required parameters
 * are checked when the pipeline builds its steps, so configurations built
 * in code fail the same way.
 *
 * @throws AnalysisError (invalidParameter) with the offending paths
 */
export function parsePipelineConfig(input: unknown): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw invalidParameter('pipeline config', formatIssues(parsed.error));
  }
  return parsed.data;
}
