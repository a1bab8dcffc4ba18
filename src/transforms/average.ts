/**
 * Sweep Averaging
 */
import { AnalysisError } from '../errors';
import { groupByIntensity } from '../recording/context';
import type { AveragedTable, AveragedTrace, SweepTable } from '../recording/types';
import { mean, sem } from '../signal-processing/statistics';

/**
 * Collapse the sweeps of each stimulus intensity into one mean trace.
 *
 * Sweeps of an intensity are matched sample by sample on their shared time
 * grid. `sem` uses the sample standard deviation (N-1), so it is NaN for an
 * intensity with a single sweep.
 *
 * @returns One trace per intensity, sorted by intensity
 * @throws AnalysisError (dataInconsistency) when sweeps of one intensity
 *   differ in length
 */
export function averageSweeps(sweeps: SweepTable): AveragedTable {
  const traces: AveragedTrace[] = [];

  for (const [stimIntensity, group] of groupByIntensity(sweeps)) {
    const length = group[0].time.length;
    if (group.some((sweep) => sweep.time.length !== length)) {
      throw new AnalysisError({
        type: 'dataInconsistency',
        component: 'average_sweeps',
        detail: `sweeps at intensity ${stimIntensity} have different lengths`,
      });
    }

    const meanTrace: number[] = [];
    const semTrace: number[] = [];
    for (let i = 0; i < length; i++) {
      const column = group.map((sweep) => sweep.voltage[i]);
      meanTrace.push(mean(column));
      semTrace.push(sem(column));
    }

    traces.push({
      stimIntensity,
      time: [...group[0].time],
      mean: meanTrace,
      sem: semTrace,
    });
  }

  return traces.sort((a, b) => a.stimIntensity - b.stimIntensity);
}
