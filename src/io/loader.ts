/**
 * Recording Loader
 *
 * Turns acquired sweeps into a recording context. Sweeps are recorded in
 * blocks: every stimulus intensity gets `repetitions` consecutive sweeps.
 */
import { AnalysisError, invalidParameter } from '../errors';
import { createRecordingContext, sortSweeps } from '../recording/context';
import type { RecordingContext, RecordingMetadata, Sweep } from '../recording/types';

/**
 * One sweep as acquired: time in seconds from the stimulus, voltage in mV.
 */
export interface AcquiredSweep {
  time: readonly number[];
  voltage: readonly number[];
}

export interface LoadOptions {
  /** Sweeps in acquisition order */
  sweeps: readonly AcquiredSweep[];
  sampleRateHz: number;
  /** One intensity per block of `repetitions` sweeps */
  stimIntensities: readonly number[];
  repetitions: number;
  metadata?: RecordingMetadata;
}

/**
 * Build a recording context from acquired sweeps.
 *
 * Sweep `i` gets intensity `stimIntensities[floor(i / repetitions)]` and
 * sweep id `i % repetitions + 1`.
 *
 * @throws AnalysisError (shapeMismatch) unless there are exactly
 *   `stimIntensities.length * repetitions` sweeps; (dataInconsistency) for a
 *   sweep whose time and voltage lengths differ or whose time axis is not
 *   strictly increasing; (invalidParameter) for a bad repetition count or
 *   sampling rate
 */
export function buildRecordingContext(options: LoadOptions): RecordingContext {
  const { sweeps, stimIntensities, repetitions } = options;

  if (!Number.isInteger(repetitions) || repetitions < 1) {
    throw invalidParameter('loader', `repetitions must be a positive integer (got ${repetitions})`);
  }

  const expected = stimIntensities.length * repetitions;
  if (sweeps.length !== expected) {
    throw new AnalysisError({
      type: 'shapeMismatch',
      expected,
      found: sweeps.length,
      detail: `${stimIntensities.length} intensities x ${repetitions} repetitions`,
    });
  }

  const table: Sweep[] = sweeps.map((sweep, i) => {
    validateSweep(sweep, i);
    return {
      stimIntensity: stimIntensities[Math.floor(i / repetitions)],
      sweepId: (i % repetitions) + 1,
      time: [...sweep.time],
      voltage: [...sweep.voltage],
      timeOffset: 0,
    };
  });

  return createRecordingContext({
    sweeps: sortSweeps(table),
    sampleRateHz: options.sampleRateHz,
    metadata: { ...options.metadata, stimIntensities: [...stimIntensities], repetitions },
  });
}

function validateSweep(sweep: AcquiredSweep, index: number): void {
  if (sweep.time.length !== sweep.voltage.length) {
    throw new AnalysisError({
      type: 'dataInconsistency',
      component: 'loader',
      detail: `sweep ${index} has ${sweep.time.length} time points but ${sweep.voltage.length} voltages`,
    });
  }
  for (let k = 1; k < sweep.time.length; k++) {
    if (!(sweep.time[k] > sweep.time[k - 1])) {
      throw new AnalysisError({
        type: 'dataInconsistency',
        component: 'loader',
        detail: `sweep ${index} time axis is not strictly increasing at sample ${k}`,
      });
    }
  }
}
