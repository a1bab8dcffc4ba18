/**
 * Field EPSP
 *
 * Minimum and initial slope of the field excitatory postsynaptic potential.
 */
import { z } from 'zod';
import { type ComponentParams, parseParams, requireParam, windowMsSchema } from '../params';
import { getResult } from '../recording/context';
import { gradient } from '../signal-processing/derivative';
import { linearFit } from '../signal-processing/regression';
import { argMin } from '../signal-processing/statistics';
import { windowToIndices } from '../signal-processing/time-index';
import type { SmoothingSpec } from '../signal-processing/types';
import { type SmoothedTrace, smoothedTraces } from './traces';
import type { EpspParams, EpspRow, Feature, FiberVolleyRow } from './types';

export const DEFAULT_FIT_DISTANCE = 4;

const paramsSchema = z.object({
  windowMs: windowMsSchema.optional(),
  fitDistance: z.number().int().min(1).default(DEFAULT_FIT_DISTANCE),
});

/**
 * Validate fEPSP parameters.
 *
 * @throws AnalysisError (missingParameter) without `windowMs`
 */
export function parseEpspParams(params: ComponentParams): EpspParams {
  const parsed = parseParams('epsp', paramsSchema, params);
  return {
    windowMs: requireParam('epsp', parsed, 'windowMs'),
    fitDistance: parsed.fitDistance,
  };
}

function missingRow(stimIntensity: number): EpspRow {
  return {
    stimIntensity,
    epspTime: NaN,
    epspVoltage: NaN,
    slopeMidTime: NaN,
    slopeMidVoltage: NaN,
    slope: NaN,
    slopeMs: NaN,
    rSquared: NaN,
    slopeToFvAmp: NaN,
  };
}

/**
 * Measure the fEPSP of each intensity.
 *
 * The minimum is the lowest sample in the window. The slope is fitted around
 * the steepest descent in the same window, which need not be next to the
 * minimum: `fitDistance` samples either side, clamped to the trace, with
 * time measured from the midpoint.
 *
 * @param traces Smoothed traces
 * @param params fEPSP parameters
 * @param fiberVolley Fiber volley rows for the slope/amplitude ratio
 */
export function computeEpsp(
  traces: readonly SmoothedTrace[],
  params: EpspParams,
  fiberVolley?: readonly FiberVolleyRow[]
): EpspRow[] {
  return traces.map(({ stimIntensity, time, voltage }) => {
    const { start, stop } = windowToIndices(time, params.windowMs);
    if (stop <= start) return missingRow(stimIntensity);

    const minIndex = start + argMin(voltage.slice(start, stop));
    const dy = gradient(voltage, time);
    const midIndex = start + argMin(dy.slice(start, stop));

    const lo = Math.max(0, midIndex - params.fitDistance);
    const hi = Math.min(voltage.length - 1, midIndex + params.fitDistance);
    const origin = time[midIndex];
    const fit = linearFit(
      time.slice(lo, hi + 1).map((t) => t - origin),
      voltage.slice(lo, hi + 1)
    );
    const slopeMs = fit.slope / 1000;

    const fv = fiberVolley?.find((row) => row.stimIntensity === stimIntensity);
    const ratioDefined =
      fv !== undefined && Number.isFinite(fv.fvAmp) && fv.fvAmp !== 0 && Number.isFinite(slopeMs) && slopeMs !== 0;

    return {
      stimIntensity,
      epspTime: time[minIndex],
      epspVoltage: voltage[minIndex],
      slopeMidTime: origin,
      slopeMidVoltage: voltage[midIndex],
      slope: fit.slope,
      slopeMs,
      rSquared: fit.rSquared,
      slopeToFvAmp: ratioDefined ? slopeMs / fv.fvAmp : NaN,
    };
  });
}

export function createEpspFeature(
  params: ComponentParams,
  smoothing: Readonly<SmoothingSpec>
): Feature<'epsp'> {
  const resolved = parseEpspParams(params);
  return {
    name: 'epsp',
    smoothing,
    compute: (context) =>
      computeEpsp(smoothedTraces(context, smoothing, 'epsp'), resolved, getResult(context, 'fiber_volley')),
  };
}
