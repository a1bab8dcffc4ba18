/**
 * Recording Context Helpers
 *
 * Construction, immutable updates and row/partition conversions.
 */
import { AnalysisError, invalidParameter } from '../errors';
import type { FeatureName, FeatureResults, FeatureRowMap } from '../feature-extraction/types';
import type {
  AveragedRow,
  AveragedTable,
  RawSample,
  RecordingContext,
  RecordingMetadata,
  Sweep,
  SweepTable,
} from './types';

// ============================================================================
// CONTEXT
// ============================================================================

/**
 * Create a context for a freshly acquired recording.
 *
 * @throws AnalysisError (invalidParameter) for a non-positive sampling rate
 */
export function createRecordingContext(options: {
  sweeps: SweepTable;
  sampleRateHz: number;
  metadata?: RecordingMetadata;
}): RecordingContext {
  if (!Number.isFinite(options.sampleRateHz) || options.sampleRateHz <= 0) {
    throw invalidParameter(
      'recording',
      `sampling rate must be a positive number of Hz (got ${options.sampleRateHz})`
    );
  }

  return {
    sweeps: options.sweeps,
    averaged: null,
    sampleRateHz: options.sampleRateHz,
    metadata: { ...options.metadata },
    results: {},
  };
}

export function withSweeps(context: RecordingContext, sweeps: SweepTable): RecordingContext {
  return { ...context, sweeps };
}

export function withAveraged(context: RecordingContext, averaged: AveragedTable): RecordingContext {
  return { ...context, averaged };
}

export function withMetadata(context: RecordingContext, metadata: RecordingMetadata): RecordingContext {
  return { ...context, metadata: { ...context.metadata, ...metadata } };
}

export function withResult<K extends FeatureName>(
  context: RecordingContext,
  name: K,
  rows: readonly FeatureRowMap[K][]
): RecordingContext {
  const results: FeatureResults = { ...context.results, [name]: rows };
  return { ...context, results };
}

/**
 * Look up an earlier feature's rows by name.
 */
export function getResult<K extends FeatureName>(
  context: RecordingContext,
  name: K
): readonly FeatureRowMap[K][] | undefined {
  return context.results[name];
}

// ============================================================================
// SWEEP PARTITIONS
// ============================================================================

/**
 * Group sweeps by stimulus intensity, preserving table order.
 */
export function groupByIntensity(sweeps: SweepTable): Map<number, Sweep[]> {
  const groups = new Map<number, Sweep[]>();
  for (const sweep of sweeps) {
    const group = groups.get(sweep.stimIntensity);
    if (group) {
      group.push(sweep);
    } else {
      groups.set(sweep.stimIntensity, [sweep]);
    }
  }
  return groups;
}

/**
 * Time axis of a sweep on the acquisition (stimulus-relative) clock.
 */
export function acquisitionTime(sweep: Sweep): number[] {
  return sweep.time.map((t) => t + sweep.timeOffset);
}

/**
 * Sort sweeps by (stimIntensity, sweepId).
 */
export function sortSweeps(sweeps: readonly Sweep[]): Sweep[] {
  return [...sweeps].sort((a, b) => a.stimIntensity - b.stimIntensity || a.sweepId - b.sweepId);
}

// ============================================================================
// ROW CONVERSIONS
// ============================================================================

/**
 * Flatten sweeps into tidy rows ordered by (stimIntensity, sweepId, time).
 */
export function toRawSamples(sweeps: SweepTable): RawSample[] {
  const rows: RawSample[] = [];
  for (const sweep of sortSweeps(sweeps)) {
    for (let i = 0; i < sweep.time.length; i++) {
      rows.push({
        time: sweep.time[i],
        voltage: sweep.voltage[i],
        stimIntensity: sweep.stimIntensity,
        sweepId: sweep.sweepId,
      });
    }
  }
  return rows;
}

/**
 * Partition tidy rows into sweeps.
 *
 * @throws AnalysisError (dataInconsistency) when a sweep repeats a time point
 */
export function fromRawSamples(rows: readonly RawSample[]): Sweep[] {
  const partitions = new Map<string, RawSample[]>();
  for (const row of rows) {
    const key = `${row.stimIntensity}:${row.sweepId}`;
    const partition = partitions.get(key);
    if (partition) {
      partition.push(row);
    } else {
      partitions.set(key, [row]);
    }
  }

  const sweeps: Sweep[] = [];
  for (const partition of partitions.values()) {
    const ordered = [...partition].sort((a, b) => a.time - b.time);
    const { stimIntensity, sweepId } = ordered[0];
    const time = ordered.map((r) => r.time);
    sweeps.push({
      stimIntensity,
      sweepId,
      time: assertStrictlyIncreasing(time, stimIntensity, sweepId),
      voltage: ordered.map((r) => r.voltage),
      timeOffset: 0,
    });
  }

  return sortSweeps(sweeps);
}

function assertStrictlyIncreasing(time: number[], stimIntensity: number, sweepId: number): number[] {
  for (let i = 1; i < time.length; i++) {
    if (!(time[i] > time[i - 1])) {
      throw new AnalysisError({
        type: 'dataInconsistency',
        component: 'recording',
        detail: `sweep ${sweepId} at intensity ${stimIntensity} repeats time ${time[i]}`,
      });
    }
  }
  return time;
}

/**
 * Flatten an averaged table into tidy rows ordered by (stimIntensity, time).
 */
export function averagedRows(averaged: AveragedTable): AveragedRow[] {
  const rows: AveragedRow[] = [];
  for (const trace of averaged) {
    for (let i = 0; i < trace.time.length; i++) {
      rows.push({
        stimIntensity: trace.stimIntensity,
        time: trace.time[i],
        mean: trace.mean[i],
        sem: trace.sem[i],
      });
    }
  }
  return rows;
}
