/**
 * Feature Extraction Types
 *
 * Result rows and configuration for the field potential features. Every
 * row belongs to one stimulus intensity; values that could not be measured
 * for that intensity are NaN.
 */
import type { ComponentParams } from '../params';
import type { RecordingContext } from '../recording/types';
import type { SmoothingSpec } from '../signal-processing/types';

// ============================================================================
// RESULT ROWS
// ============================================================================

/**
 * Fiber volley: the early negative deflection from presynaptic firing.
 */
export interface FiberVolleyRow {
  stimIntensity: number;
  /** |fvVoltage| (mV) */
  fvAmp: number;
  /** Time of the trough (s) */
  fvTime: number;
  /** Voltage at the trough (mV) */
  fvVoltage: number;
}

/**
 * Field EPSP: minimum and initial slope of the postsynaptic potential.
 */
export interface EpspRow {
  stimIntensity: number;
  /** Time of the lowest voltage in the window (s) */
  epspTime: number;
  /** Lowest voltage in the window (mV) */
  epspVoltage: number;
  /** Time of the steepest descent (s) */
  slopeMidTime: number;
  /** Voltage at the steepest descent (mV) */
  slopeMidVoltage: number;
  /** Fitted slope (mV/s) */
  slope: number;
  /** Fitted slope (mV/ms) */
  slopeMs: number;
  /** R² of the slope fit */
  rSquared: number;
  /** slopeMs / fiber volley amplitude, NaN without a usable fiber volley */
  slopeToFvAmp: number;
}

/**
 * How a population spike apex was found.
 */
export type PopSpikeDetection = 'prominence' | 'derivative' | 'none';

/**
 * Population spike: positive deflection riding on the fEPSP.
 */
export interface PopSpikeRow {
  stimIntensity: number;
  /** Spike amplitude (mV) */
  psAmp: number;
  /** Time of the spike apex (s) */
  psTime: number;
  /** Voltage at the apex (mV) */
  psVoltage: number;
  /** Reference level the amplitude is measured from (mV) */
  baselineVoltage: number;
  detection: PopSpikeDetection;
}

export interface FeatureRowMap {
  fiber_volley: FiberVolleyRow;
  epsp: EpspRow;
  pop_spike: PopSpikeRow;
}

export type FeatureName = keyof FeatureRowMap;

/**
 * Result tables keyed by feature name.
 */
export type FeatureResults = { [K in FeatureName]?: readonly FeatureRowMap[K][] };

// ============================================================================
// PARAMETERS
// ============================================================================

export interface FiberVolleyParams {
  /** Search window [start, end] in ms */
  windowMs: readonly [number, number];
}

export interface EpspParams {
  /** Search window [start, end] in ms */
  windowMs: readonly [number, number];
  /** Samples on each side of the slope midpoint used for the fit */
  fitDistance: number;
}

/**
 * Population spike amplitude definitions.
 *
 * - `baseline_interpolated`: apex minus the straight line from the fEPSP
 *   minimum to the first trough after the apex, evaluated at the apex.
 * - `direct_difference`: apex minus the fEPSP minimum.
 */
export type PopSpikeAmplitude = 'baseline_interpolated' | 'direct_difference';

export interface PopSpikeParams {
  /** Search window length after the fEPSP minimum (ms) */
  lagMs: number;
  /** Minimum peak prominence (mV) */
  prominence: number;
  /** |dV/dt| below which the derivative fallback treats the trace as flat (mV/ms) */
  threshold?: number;
  amplitude: PopSpikeAmplitude;
}

// ============================================================================
// FEATURE CONTRACT
// ============================================================================

/**
 * Feature as written in a pipeline configuration.
 */
export interface FeatureConfig {
  name: string;
  params?: ComponentParams;
  /** Feature-specific smoothing; 'none' or absent defers to the pipeline default */
  smoothing?: SmoothingSpec;
}

/**
 * A configured feature. Parameters are validated when it is built.
 */
export interface Feature<K extends FeatureName = FeatureName> {
  readonly name: K;
  readonly smoothing: Readonly<SmoothingSpec>;
  compute(context: RecordingContext): FeatureRowMap[K][];
}
