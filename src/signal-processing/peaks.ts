/**
 * Peak Detection
 *
 * Local maxima with topographic prominence.
 */
import type { PeakOptions, PeakResult } from './types';

/**
 * Find local maxima in a signal.
 *
 * A flat-topped peak (plateau) is reported once, at the middle sample of the
 * plateau (rounded down). Samples at the signal boundaries are never peaks.
 *
 * @param signal Input signal
 * @param options Optional minimum prominence filter
 * @returns Peak indices in ascending order with their prominences
 */
export function findPeaks(signal: readonly number[], options: PeakOptions = {}): PeakResult {
  const candidates = localMaxima(signal);
  const prominences = peakProminences(signal, candidates);

  if (options.prominence === undefined) {
    return { indices: candidates, prominences };
  }

  const minProminence = options.prominence;
  const indices: number[] = [];
  const kept: number[] = [];
  for (let i = 0; i < candidates.length; i++) {
    if (prominences[i] >= minProminence) {
      indices.push(candidates[i]);
      kept.push(prominences[i]);
    }
  }

  return { indices, prominences: kept };
}

/**
 * Indices of strict local maxima, plateaus collapsed to their midpoint.
 */
export function localMaxima(signal: readonly number[]): number[] {
  const peaks: number[] = [];
  const last = signal.length - 1;

  let i = 1;
  while (i < last) {
    if (signal[i - 1] < signal[i]) {
      let ahead = i + 1;
      while (ahead < last && signal[ahead] === signal[i]) {
        ahead++;
      }
      if (signal[ahead] < signal[i]) {
        peaks.push(Math.floor((i + ahead - 1) / 2));
        i = ahead;
        continue;
      }
    }
    i++;
  }

  return peaks;
}

/**
 * Prominence of each peak.
 *
 * Walks outwards from the peak on both sides until a strictly higher sample
 * or the signal boundary; the higher of the two minima found on the way is
 * the reference level.
 */
export function peakProminences(signal: readonly number[], peaks: readonly number[]): number[] {
  return peaks.map((peak) => {
    const height = signal[peak];

    let leftMin = height;
    for (let i = peak; i >= 0 && signal[i] <= height; i--) {
      if (signal[i] < leftMin) leftMin = signal[i];
    }

    let rightMin = height;
    for (let i = peak; i < signal.length && signal[i] <= height; i++) {
      if (signal[i] < rightMin) rightMin = signal[i];
    }

    return height - Math.max(leftMin, rightMin);
  });
}
