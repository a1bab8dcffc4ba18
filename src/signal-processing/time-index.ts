/**
 * Time Axis Utilities
 *
 * Conversions between millisecond windows and sample indices. Window edges
 * are always located by searching the time axis, never by multiplying by the
 * sampling rate, so timestamp jitter cannot shift a window by a sample.
 */

/**
 * First index whose time is >= t (lower-bound binary search).
 *
 * @param times Monotonically increasing time axis
 * @param t Target time, same unit as `times`
 * @returns Index in [0, times.length]
 */
export function timeToIndex(times: readonly number[], t: number): number {
  let low = 0;
  let high = times.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (times[mid] < t) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

/**
 * Half-open index range [start, stop) covering a millisecond window.
 *
 * @param times Time axis in seconds
 * @param windowMs [start, end] in milliseconds
 */
export function windowToIndices(
  times: readonly number[],
  windowMs: readonly [number, number]
): { start: number; stop: number } {
  const start = timeToIndex(times, windowMs[0] / 1000);
  const stop = Math.max(start, timeToIndex(times, windowMs[1] / 1000));
  return { start, stop };
}

/**
 * Convert a duration in ms to the nearest whole number of samples.
 */
export function msToSamples(timeMs: number, sampleRate: number): number {
  return Math.round((timeMs / 1000) * sampleRate);
}

/**
 * Convert a sample count to milliseconds.
 */
export function samplesToMs(samples: number, sampleRate: number): number {
  return (samples / sampleRate) * 1000;
}
