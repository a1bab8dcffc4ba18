/**
 * Fiber Volley
 *
 * Trough detection for the presynaptic fiber volley.
 */
import { z } from 'zod';
import { type ComponentParams, parseParams, requireParam, windowMsSchema } from '../params';
import { findPeaks } from '../signal-processing/peaks';
import { windowToIndices } from '../signal-processing/time-index';
import type { SmoothingSpec } from '../signal-processing/types';
import { mostProminent, type SmoothedTrace, smoothedTraces } from './traces';
import type { Feature, FiberVolleyParams, FiberVolleyRow } from './types';

const paramsSchema = z.object({
  windowMs: windowMsSchema.optional(),
});

/**
 * Validate fiber volley parameters.
 *
 * @throws AnalysisError (missingParameter) without `windowMs`
 */
export function parseFiberVolleyParams(params: ComponentParams): FiberVolleyParams {
  const parsed = parseParams('fiber_volley', paramsSchema, params);
  return { windowMs: requireParam('fiber_volley', parsed, 'windowMs') };
}

/**
 * Locate the fiber volley of each intensity.
 *
 * Candidates are the troughs (peaks of the inverted trace) inside the
 * window. The most prominent wins; equally prominent troughs are decided by
 * depth. Intensities without any trough get a NaN row.
 */
export function computeFiberVolley(
  traces: readonly SmoothedTrace[],
  params: FiberVolleyParams
): FiberVolleyRow[] {
  return traces.map(({ stimIntensity, time, voltage }) => {
    const { start, stop } = windowToIndices(time, params.windowMs);
    const windowed = voltage.slice(start, stop);

    const troughs = findPeaks(windowed.map((v) => -v));
    const best = mostProminent(troughs, (a, b) => windowed[a] < windowed[b]);

    if (best === -1) {
      return { stimIntensity, fvAmp: NaN, fvTime: NaN, fvVoltage: NaN };
    }

    const index = start + troughs.indices[best];
    const fvVoltage = voltage[index];
    return {
      stimIntensity,
      fvAmp: Math.abs(fvVoltage),
      fvTime: time[index],
      fvVoltage,
    };
  });
}

export function createFiberVolleyFeature(
  params: ComponentParams,
  smoothing: Readonly<SmoothingSpec>
): Feature<'fiber_volley'> {
  const resolved = parseFiberVolleyParams(params);
  return {
    name: 'fiber_volley',
    smoothing,
    compute: (context) => computeFiberVolley(smoothedTraces(context, smoothing, 'fiber_volley'), resolved),
  };
}
