/**
 * Stimulus Artifact Removal
 *
 * Two ways of getting rid of the stimulus artifact at the start of each
 * sweep: cut it out, or subtract a scaled copy of the intensity's mean
 * artifact.
 */
import { AnalysisError } from '../errors';
import type { WindowMs } from '../params';
import { acquisitionTime, groupByIntensity } from '../recording/context';
import type { Sweep, SweepTable } from '../recording/types';
import { dot } from '../signal-processing/statistics';
import { windowToIndices } from '../signal-processing/time-index';

export const DEFAULT_ARTIFACT_WINDOW_MS: WindowMs = [0.0, 1.25];

/** Template energy at or below this is treated as no template at all. */
export const MIN_TEMPLATE_ENERGY = 1e-20;

// ============================================================================
// CROP
// ============================================================================

/**
 * Remove the samples inside the artifact window and re-zero time.
 *
 * After cropping, every sweep starts at exactly t = 0. The amount of time
 * removed from the front is added to `timeOffset`, so the window keeps
 * referring to the same stimulus-relative interval and cropping again is a
 * no-op.
 *
 * @param sweeps Sweep table
 * @param windowMs [start, end) in ms relative to the stimulus
 */
export function cropStimArtifact(
  sweeps: SweepTable,
  windowMs: WindowMs = DEFAULT_ARTIFACT_WINDOW_MS
): SweepTable {
  return sweeps.map((sweep) => cropSweep(sweep, windowMs));
}

function cropSweep(sweep: Sweep, windowMs: WindowMs): Sweep {
  const { start, stop } = windowToIndices(acquisitionTime(sweep), windowMs);

  const time = [...sweep.time.slice(0, start), ...sweep.time.slice(stop)];
  const voltage = [...sweep.voltage.slice(0, start), ...sweep.voltage.slice(stop)];
  if (time.length === 0) {
    return { ...sweep, time, voltage };
  }

  const origin = time[0];
  return {
    ...sweep,
    time: time.map((t) => t - origin),
    voltage,
    timeOffset: sweep.timeOffset + origin,
  };
}

// ============================================================================
// TEMPLATE SUBTRACTION
// ============================================================================

/**
 * Subtract a least-squares scaled artifact template from each sweep.
 *
 * For each stimulus intensity the template is the sample-wise mean of its
 * sweeps. Inside the window each sweep is projected onto the template,
 * `a = (y·T) / (T·T)`, and `a·T` is subtracted; samples outside the window
 * are untouched. An intensity whose template has no energy in the window is
 * left unchanged.
 *
 * @param sweeps Sweep table
 * @param windowMs [start, end) in ms relative to the stimulus
 * @throws AnalysisError (dataInconsistency) when sweeps of one intensity do
 *   not share a time grid
 */
export function templateSubtractStimArtifact(
  sweeps: SweepTable,
  windowMs: WindowMs = DEFAULT_ARTIFACT_WINDOW_MS
): SweepTable {
  const corrected = new Map<Sweep, Sweep>();

  for (const [stimIntensity, group] of groupByIntensity(sweeps)) {
    const grid = acquisitionTime(group[0]);
    for (const sweep of group) {
      assertSameGrid(grid, acquisitionTime(sweep), stimIntensity, sweep.sweepId);
    }

    const template = grid.map((_, i) => {
      let acc = 0;
      for (const sweep of group) acc += sweep.voltage[i];
      return acc / group.length;
    });

    const { start, stop } = windowToIndices(grid, windowMs);
    const templateWindow = template.slice(start, stop);
    const energy = dot(templateWindow, templateWindow);

    if (energy <= MIN_TEMPLATE_ENERGY) {
      console.warn(
        `Template subtraction skipped at intensity ${stimIntensity}: template has no energy in [${windowMs[0]}, ${windowMs[1]}) ms`
      );
      continue;
    }

    for (const sweep of group) {
      const scale = dot(sweep.voltage.slice(start, stop), templateWindow) / energy;
      const voltage = sweep.voltage.map((v, i) =>
        i >= start && i < stop ? v - scale * template[i] : v
      );
      corrected.set(sweep, { ...sweep, voltage });
    }
  }

  return sweeps.map((sweep) => corrected.get(sweep) ?? sweep);
}

/**
 * Time grids must be sample-identical up to floating-point noise
 * (|a - b| <= 1e-8 + 1e-5·|b|).
 */
function assertSameGrid(
  reference: readonly number[],
  time: readonly number[],
  stimIntensity: number,
  sweepId: number
): void {
  const mismatch =
    reference.length !== time.length ||
    time.some((t, i) => Math.abs(t - reference[i]) > 1e-8 + 1e-5 * Math.abs(reference[i]));

  if (mismatch) {
    throw new AnalysisError({
      type: 'dataInconsistency',
      component: 'template_subtract_stim_artifact',
      detail: `time grid of sweep ${sweepId} at intensity ${stimIntensity} does not match the template`,
    });
  }
}
