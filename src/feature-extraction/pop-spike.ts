/**
 * Population Spike
 *
 * Detects the positive spike riding on the fEPSP and measures its amplitude.
 * Needs the fEPSP minimum of the same run: the search starts there.
 */
import { z } from 'zod';
import { AnalysisError } from '../errors';
import { type ComponentParams, parseParams, requireParam } from '../params';
import { getResult } from '../recording/context';
import { gradient } from '../signal-processing/derivative';
import { lerp } from '../signal-processing/interpolation';
import { findPeaks } from '../signal-processing/peaks';
import { argMax, argMin } from '../signal-processing/statistics';
import { timeToIndex } from '../signal-processing/time-index';
import type { SmoothingSpec } from '../signal-processing/types';
import { mostProminent, type SmoothedTrace, smoothedTraces } from './traces';
import type { EpspRow, Feature, PopSpikeDetection, PopSpikeParams, PopSpikeRow } from './types';

const paramsSchema = z.object({
  lagMs: z.number().positive().optional(),
  prominence: z.number().nonnegative().optional(),
  threshold: z.number().positive().optional(),
  amplitude: z.enum(['baseline_interpolated', 'direct_difference']).default('baseline_interpolated'),
});

/**
 * Validate population spike parameters.
 *
 * @throws AnalysisError (missingParameter) without `lagMs` or `prominence`
 */
export function parsePopSpikeParams(params: ComponentParams): PopSpikeParams {
  const parsed = parseParams('pop_spike', paramsSchema, params);
  return {
    lagMs: requireParam('pop_spike', parsed, 'lagMs'),
    prominence: requireParam('pop_spike', parsed, 'prominence'),
    threshold: parsed.threshold,
    amplitude: parsed.amplitude,
  };
}

function missingRow(stimIntensity: number): PopSpikeRow {
  return {
    stimIntensity,
    psAmp: NaN,
    psTime: NaN,
    psVoltage: NaN,
    baselineVoltage: NaN,
    detection: 'none',
  };
}

/**
 * Find the spike apex inside a window.
 *
 * First choice is the most prominent peak clearing `prominence`. Failing
 * that, and given a `threshold`, the spike is taken to start at the steepest
 * rise and end at the first sample after it where |dV/dt| drops below the
 * threshold; the highest sample in between counts if it rises at least
 * `prominence` above the start.
 *
 * @returns Window-relative apex index, or null when no spike is found
 */
export function findSpikeApex(
  windowed: readonly number[],
  slopeMs: readonly number[],
  params: Pick<PopSpikeParams, 'prominence' | 'threshold'>
): { index: number; detection: PopSpikeDetection } | null {
  const peaks = findPeaks(windowed, { prominence: params.prominence });
  const best = mostProminent(peaks, (a, b) => windowed[a] > windowed[b]);
  if (best !== -1) {
    return { index: peaks.indices[best], detection: 'prominence' };
  }

  if (params.threshold === undefined) return null;

  const riseStart = argMax(slopeMs);
  if (riseStart === -1 || !(slopeMs[riseStart] > 0)) return null;

  let riseEnd = -1;
  for (let k = riseStart + 1; k < slopeMs.length; k++) {
    if (Math.abs(slopeMs[k]) < params.threshold) {
      riseEnd = k;
      break;
    }
  }
  if (riseEnd === -1) return null;

  const apex = riseStart + argMax(windowed.slice(riseStart, riseEnd + 1));
  if (windowed[apex] - windowed[riseStart] >= params.prominence) {
    return { index: apex, detection: 'derivative' };
  }
  return null;
}

/**
 * Measure the population spike of each intensity.
 *
 * The search window runs from the fEPSP minimum for `lagMs`. With the
 * `baseline_interpolated` amplitude, the reference is the straight line from
 * the fEPSP minimum to the first trough after the apex (or the lowest sample
 * after it), evaluated at the apex time; with `direct_difference`, and
 * whenever the apex is the last sample of the window, it is the fEPSP
 * minimum itself.
 */
export function computePopSpike(
  traces: readonly SmoothedTrace[],
  epsp: readonly EpspRow[],
  params: PopSpikeParams
): PopSpikeRow[] {
  return traces.map(({ stimIntensity, time, voltage }) => {
    const epspRow = epsp.find((row) => row.stimIntensity === stimIntensity);
    if (!epspRow || !Number.isFinite(epspRow.epspTime) || !Number.isFinite(epspRow.epspVoltage)) {
      return missingRow(stimIntensity);
    }

    const start = timeToIndex(time, epspRow.epspTime);
    const stop = Math.max(start, timeToIndex(time, epspRow.epspTime + params.lagMs / 1000));
    const windowed = voltage.slice(start, stop);
    const slopeMs = gradient(voltage, time)
      .slice(start, stop)
      .map((d) => d / 1000);

    const apex = findSpikeApex(windowed, slopeMs, params);
    if (apex === null) return missingRow(stimIntensity);

    const psTime = time[start + apex.index];
    const psVoltage = voltage[start + apex.index];

    let baselineVoltage = epspRow.epspVoltage;
    if (params.amplitude === 'baseline_interpolated') {
      const anchor = returnAnchor(windowed, apex.index);
      if (anchor !== -1) {
        baselineVoltage = lerp(
          epspRow.epspTime,
          epspRow.epspVoltage,
          time[start + anchor],
          windowed[anchor],
          psTime
        );
      }
    }

    return {
      stimIntensity,
      psAmp: Math.abs(psVoltage - baselineVoltage),
      psTime,
      psVoltage,
      baselineVoltage,
      detection: apex.detection,
    };
  });
}

/**
 * Where the trace returns towards baseline after the apex: the first local
 * minimum after it, else the lowest sample after it. -1 if the apex is the
 * last sample.
 */
function returnAnchor(windowed: readonly number[], apexIndex: number): number {
  const after = windowed.slice(apexIndex + 1);
  if (after.length === 0) return -1;

  const troughs = findPeaks(windowed.map((v) => -v));
  const next = troughs.indices.find((i) => i > apexIndex);
  return next ?? apexIndex + 1 + argMin(after);
}

export function createPopSpikeFeature(
  params: ComponentParams,
  smoothing: Readonly<SmoothingSpec>
): Feature<'pop_spike'> {
  const resolved = parsePopSpikeParams(params);
  return {
    name: 'pop_spike',
    smoothing,
    compute: (context) => {
      const epsp = getResult(context, 'epsp');
      if (epsp === undefined || epsp.length === 0) {
        throw new AnalysisError({ type: 'missingDependency', component: 'pop_spike', dependency: 'epsp' });
      }
      return computePopSpike(smoothedTraces(context, smoothing, 'pop_spike'), epsp, resolved);
    },
  };
}
