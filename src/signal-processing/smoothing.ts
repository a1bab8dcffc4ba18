/**
 * Smoothing Policy
 *
 * Decides which smoothing a component uses and applies it to a trace.
 */
import { invalidParameter } from '../errors';
import { butterworthLowpass } from './filters/butterworth';
import { movingAverage } from './filters/moving-average';
import { savgolFilter } from './filters/savgol';
import type { SmoothingSpec } from './types';

/**
 * Resolve the smoothing a component runs with.
 *
 * A component's own spec wins only when it actually smooths (method other
 * than 'none'); otherwise the pipeline-wide default applies. The result is
 * frozen so it cannot drift during a run.
 */
export function resolveSmoothing(
  local: SmoothingSpec | undefined,
  pipelineDefault: SmoothingSpec
): Readonly<SmoothingSpec> {
  const chosen = local !== undefined && local.method !== 'none' ? local : pipelineDefault;
  return Object.freeze({ ...chosen });
}

/**
 * Apply a smoothing spec to a 1-D trace.
 *
 * @param data Trace to smooth
 * @param spec Resolved smoothing spec
 * @param sampleRate Sampling rate in Hz, required for Butterworth smoothing
 * @returns New smoothed array; 'none' returns an unmodified copy
 */
export function applySmoothing(
  data: readonly number[],
  spec: Readonly<SmoothingSpec>,
  sampleRate?: number
): number[] {
  switch (spec.method) {
    case 'none':
      return [...data];
    case 'moving_average':
      return movingAverage(data, spec.windowSize);
    case 'savgol': {
      // Callers may configure an even window; bump it to the next odd length
      const window = spec.windowSize % 2 === 0 ? spec.windowSize + 1 : spec.windowSize;
      return savgolFilter(data, window, spec.polyOrder);
    }
    case 'butterworth_lowpass':
      return butterworthLowpass(data, sampleRate, spec.cutoffHz, spec.order);
    default:
      return unknownMethod(spec);
  }
}

function unknownMethod(spec: { method: unknown }): never {
  throw invalidParameter('smoothing', `unknown smoothing method '${String(spec.method)}'`);
}
