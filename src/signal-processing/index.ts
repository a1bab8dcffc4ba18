/**
 * Signal Processing Module
 *
 * Numeric primitives shared by transforms and feature extraction.
 */

// Types
export * from './types';

// Statistics
export { mean, sampleStd, sem, dot, argMin, argMax, rms } from './statistics';

// Time axis
export { timeToIndex, windowToIndices, msToSamples, samplesToMs } from './time-index';

// Interpolation
export { lerp } from './interpolation';

// Calculus
export { gradient, trapz } from './derivative';

// Detection and fitting
export { findPeaks, localMaxima, peakProminences } from './peaks';
export { linearFit } from './regression';

// Filters
export { movingAverage } from './filters/moving-average';
export { savgolFilter } from './filters/savgol';
export {
  butterworthLowpass,
  butterworthLowpassSections,
  sosfiltfilt,
  steadyStateConditions,
  lfilterWithZi,
} from './filters/butterworth';

// Smoothing policy
export { resolveSmoothing, applySmoothing } from './smoothing';
