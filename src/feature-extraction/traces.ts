/**
 * Smoothed Traces
 *
 * Per-intensity traces as the feature detectors see them.
 */
import { AnalysisError } from '../errors';
import type { RecordingContext } from '../recording/types';
import { applySmoothing } from '../signal-processing/smoothing';
import type { PeakResult, SmoothingSpec } from '../signal-processing/types';

/**
 * Averaged trace of one intensity after the feature's smoothing.
 */
export interface SmoothedTrace {
  stimIntensity: number;
  /** Time axis in seconds */
  time: readonly number[];
  /** Smoothed mean voltage in mV */
  voltage: readonly number[];
}

/**
 * Smooth the averaged mean trace of every intensity once.
 *
 * @throws AnalysisError (missingDependency) when the sweeps have not been
 *   averaged yet
 */
export function smoothedTraces(
  context: RecordingContext,
  smoothing: Readonly<SmoothingSpec>,
  component: string
): SmoothedTrace[] {
  if (context.averaged === null) {
    throw new AnalysisError({ type: 'missingDependency', component, dependency: 'average_sweeps' });
  }

  return context.averaged.map((trace) => ({
    stimIntensity: trace.stimIntensity,
    time: trace.time,
    voltage: applySmoothing(trace.mean, smoothing, context.sampleRateHz),
  }));
}

/**
 * Position (into `peaks.indices`) of the most prominent peak; ties go to
 * the candidate that `prefer` ranks first. -1 when there are no peaks.
 */
export function mostProminent(
  peaks: PeakResult,
  prefer: (a: number, b: number) => boolean
): number {
  let best = -1;
  for (let k = 0; k < peaks.indices.length; k++) {
    if (
      best === -1 ||
      peaks.prominences[k] > peaks.prominences[best] ||
      (peaks.prominences[k] === peaks.prominences[best] && prefer(peaks.indices[k], peaks.indices[best]))
    ) {
      best = k;
    }
  }
  return best;
}
