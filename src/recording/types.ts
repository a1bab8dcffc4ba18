/**
 * Recording Types
 *
 * Data model shared by transforms, averaging and feature extraction.
 */
import type { FeatureResults } from '../feature-extraction/types';

// ============================================================================
// SWEEPS
// ============================================================================

/**
 * One (time, voltage) observation in tidy row form.
 */
export interface RawSample {
  /** Time in seconds, increasing within a sweep */
  time: number;
  /** Voltage in mV */
  voltage: number;
  /** Stimulus intensity group key (e.g. µA) */
  stimIntensity: number;
  /** Repetition id within the intensity group, 1-based */
  sweepId: number;
}

/**
 * One sweep: all samples of a single (stimIntensity, sweepId) partition.
 */
export interface Sweep {
  stimIntensity: number;
  sweepId: number;
  /** Time axis in seconds, strictly increasing */
  time: readonly number[];
  /** Voltage in mV, aligned with `time` */
  voltage: readonly number[];
  /**
   * Acquisition time (s) of the sample now at time 0. Zero until an
   * artifact crop re-zeroes the sweep.
   */
  timeOffset: number;
}

/**
 * All sweeps of a recording, ordered by (stimIntensity, sweepId).
 */
export type SweepTable = readonly Sweep[];

// ============================================================================
// AVERAGED TRACES
// ============================================================================

/**
 * Across-sweep mean trace for one stimulus intensity.
 */
export interface AveragedTrace {
  stimIntensity: number;
  /** Shared time axis in seconds */
  time: readonly number[];
  /** Mean voltage (mV) per time point */
  mean: readonly number[];
  /** Standard error of the mean (mV) per time point, NaN for a single sweep */
  sem: readonly number[];
}

/**
 * One averaged trace per intensity, sorted by intensity.
 */
export type AveragedTable = readonly AveragedTrace[];

/**
 * Averaged table in tidy row form.
 */
export interface AveragedRow {
  stimIntensity: number;
  time: number;
  mean: number;
  sem: number;
}

// ============================================================================
// CONTEXT
// ============================================================================

export type RecordingMetadata = Readonly<Record<string, unknown>>;

/**
 * Everything known about one recording at one stage of the pipeline.
 *
 * Stages never modify a context; they return a new one.
 */
export interface RecordingContext {
  readonly sweeps: SweepTable;
  /** Null until sweeps have been averaged */
  readonly averaged: AveragedTable | null;
  /** Sampling rate in Hz */
  readonly sampleRateHz: number;
  readonly metadata: RecordingMetadata;
  readonly results: Readonly<FeatureResults>;
}
