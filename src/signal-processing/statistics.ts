/**
 * Statistical Utilities
 *
 * Basic statistics used for baselines and sweep averaging.
 */

/**
 * Calculate the arithmetic mean of an array.
 * Returns NaN for an empty array.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Calculate the sample standard deviation of an array.
 * Uses Bessel's correction (N-1), so a single value has no defined spread.
 */
export function sampleStd(values: readonly number[]): number {
  if (values.length <= 1) return NaN;
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) * (v - m), 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Standard error of the mean: sample std / sqrt(N).
 */
export function sem(values: readonly number[]): number {
  return sampleStd(values) / Math.sqrt(values.length);
}

/**
 * Dot product of two equal-length slices.
 */
export function dot(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  let acc = 0;
  for (let i = 0; i < n; i++) {
    acc += a[i] * b[i];
  }
  return acc;
}

/**
 * Index of the smallest value; -1 for an empty array.
 * Ties resolve to the first occurrence.
 */
export function argMin(values: readonly number[]): number {
  let best = -1;
  for (let i = 0; i < values.length; i++) {
    if (best === -1 || values[i] < values[best]) best = i;
  }
  return best;
}

/**
 * Index of the largest value; -1 for an empty array.
 * Ties resolve to the first occurrence.
 */
export function argMax(values: readonly number[]): number {
  let best = -1;
  for (let i = 0; i < values.length; i++) {
    if (best === -1 || values[i] > values[best]) best = i;
  }
  return best;
}

/**
 * Calculate the root mean square (RMS).
 */
export function rms(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sumSquares = values.reduce((acc, v) => acc + v * v, 0);
  return Math.sqrt(sumSquares / values.length);
}
