/**
 * Moving Average Filter
 */

/**
 * Uniform moving average with nearest-value edge extension.
 *
 * The window spans `floor(w/2)` samples before and `w - floor(w/2) - 1`
 * after each point, so even windows lean one sample to the left.
 *
 * @param data Input signal
 * @param windowSize Window length, clamped to [1, data.length]
 * @returns Smoothed signal with the same length as input
 */
export function movingAverage(data: readonly number[], windowSize: number): number[] {
  const n = data.length;
  if (n === 0) return [];

  const w = Math.min(Math.max(Math.floor(windowSize), 1), n);
  if (w === 1) return [...data];

  const before = Math.floor(w / 2);
  const after = w - before - 1;
  const at = (i: number): number => data[Math.min(Math.max(i, 0), n - 1)];

  const result = new Array<number>(n);
  let acc = 0;
  for (let j = -before; j <= after; j++) {
    acc += at(j);
  }
  result[0] = acc / w;

  // Running sum: slide the window one sample at a time
  for (let i = 1; i < n; i++) {
    acc += at(i + after) - at(i - 1 - before);
    result[i] = acc / w;
  }

  return result;
}
