/**
 * Baseline Correction
 *
 * Removes each sweep's DC offset measured in a pre-stimulus window.
 */
import { acquisitionTime } from '../recording/context';
import type { SweepTable } from '../recording/types';
import { mean } from '../signal-processing/statistics';
import { windowToIndices } from '../signal-processing/time-index';
import type { WindowMs } from '../params';

export const DEFAULT_BASELINE_WINDOW_MS: WindowMs = [0.0, 0.1];

/**
 * Subtract the mean voltage inside `windowMs` from every sample of each sweep.
 *
 * The window is located on the acquisition clock, so after an artifact crop
 * it may no longer contain any samples. Such sweeps are returned as is and
 * reported with one warning per call.
 *
 * @param sweeps Sweep table
 * @param windowMs [start, end) in ms relative to the stimulus
 * @returns New sweep table; the time axis is untouched
 */
export function baselineCorrection(
  sweeps: SweepTable,
  windowMs: WindowMs = DEFAULT_BASELINE_WINDOW_MS
): SweepTable {
  let skipped = 0;
  const corrected = sweeps.map((sweep) => {
    const { start, stop } = windowToIndices(acquisitionTime(sweep), windowMs);
    if (stop <= start) {
      skipped++;
      return sweep;
    }

    const baseline = mean(sweep.voltage.slice(start, stop));
    return { ...sweep, voltage: sweep.voltage.map((v) => v - baseline) };
  });

  if (skipped > 0) {
    console.warn(
      `Baseline correction skipped for ${skipped} of ${sweeps.length} sweeps: no samples in [${windowMs[0]}, ${windowMs[1]}) ms`
    );
  }
  return corrected;
}
