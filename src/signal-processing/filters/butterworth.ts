/**
 * Butterworth Filters
 *
 * IIR Butterworth low-pass with zero-phase filtering.
 */
import { invalidParameter } from '../../errors';
import type { FilterCoefficients } from '../types';

/**
 * Butterworth lowpass filter, applied forward and backward.
 *
 * @param data Input signal
 * @param sampleRate Sample rate in Hz
 * @param cutoff Cutoff frequency in Hz, below Nyquist
 * @param order Filter order (default: 3)
 * @returns Filtered signal with zero phase shift
 * @throws AnalysisError (invalidParameter) when the sample rate is missing,
 *   or the cutoff or order are out of range
 */
export function butterworthLowpass(
  data: readonly number[],
  sampleRate: number | undefined,
  cutoff: number,
  order: number = 3
): number[] {
  if (sampleRate === undefined || !Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw invalidParameter('butterworth_lowpass', 'a positive sampling rate is required');
  }
  if (!Number.isInteger(order) || order < 1) {
    throw invalidParameter('butterworth_lowpass', `order must be a positive integer (got ${order})`);
  }

  const nyquist = sampleRate / 2.0;
  if (!(cutoff > 0 && cutoff < nyquist)) {
    throw invalidParameter(
      'butterworth_lowpass',
      `cutoff must lie in (0, ${nyquist}) Hz for a ${sampleRate} Hz recording (got ${cutoff})`
    );
  }

  if (data.length === 0) return [];

  const sections = butterworthLowpassSections(cutoff / nyquist, order);
  return sosfiltfilt(data, sections);
}

/**
 * Butterworth lowpass as a cascade of second-order sections.
 *
 * Uses the bilinear transform with frequency prewarping. An odd order adds
 * one first-order section at the end of the cascade.
 *
 * @param normalizedCutoff Cutoff as a fraction of Nyquist, in (0, 1)
 * @param order Filter order
 */
export function butterworthLowpassSections(
  normalizedCutoff: number,
  order: number
): FilterCoefficients[] {
  const k = Math.tan((Math.PI * normalizedCutoff) / 2);
  const k2 = k * k;
  const sections: FilterCoefficients[] = [];

  for (let pair = 1; pair <= Math.floor(order / 2); pair++) {
    // Damping of one conjugate pole pair of the analog prototype
    const damping = 2 * Math.sin((Math.PI * (2 * pair - 1)) / (2 * order));
    const norm = 1.0 / (1.0 + damping * k + k2);

    const b0 = k2 * norm;
    sections.push({
      b: [b0, 2.0 * b0, b0],
      a: [1.0, 2.0 * (k2 - 1.0) * norm, (1.0 - damping * k + k2) * norm],
    });
  }

  if (order % 2 === 1) {
    const norm = 1.0 / (1.0 + k);
    sections.push({
      b: [k * norm, k * norm],
      a: [1.0, (k - 1.0) * norm],
    });
  }

  return sections;
}

/**
 * Zero-phase filtering of a cascade of sections (forward-backward).
 *
 * The signal is padded at both ends by odd reflection and each section
 * starts from its steady-state response to the first padded sample, which
 * keeps the output free of start-up transients at the edges.
 *
 * @param data Input signal
 * @param sections Filter sections applied in order
 * @returns Filtered signal with the same length as input
 */
export function sosfiltfilt(data: readonly number[], sections: FilterCoefficients[]): number[] {
  const n = data.length;
  if (n === 0 || sections.length === 0) return [...data];

  const padLen = Math.min(3 * (2 * sections.length + 1), n - 1);
  const extended = oddExtend(data, padLen);

  const forward = sosfilt(extended, sections);
  const backward = sosfilt(forward.reverse(), sections).reverse();

  return backward.slice(padLen, padLen + n);
}

/**
 * Run a signal through a cascade of sections, each initialized at steady
 * state for the signal's first sample.
 */
function sosfilt(data: number[], sections: FilterCoefficients[]): number[] {
  let signal = data;
  for (const section of sections) {
    const zi = steadyStateConditions(section).map((z) => z * signal[0]);
    signal = lfilterWithZi(signal, section.b, section.a, zi).y;
  }
  return signal;
}

/**
 * Initial conditions for which a unit step input produces a constant
 * output equal to the DC gain (Direct Form II Transposed state layout).
 */
export function steadyStateConditions({ b, a }: FilterCoefficients): number[] {
  const order = Math.max(b.length, a.length);
  const coeff = (arr: number[], i: number): number => (i < arr.length ? arr[i] : 0.0);

  let sumB = 0;
  let sumA = 0;
  for (let i = 0; i < order; i++) {
    sumB += coeff(b, i);
    sumA += coeff(a, i);
  }
  const gain = sumB / sumA;

  const zi = new Array<number>(order - 1).fill(0);
  for (let k = order - 2; k >= 0; k--) {
    zi[k] = coeff(b, k + 1) - coeff(a, k + 1) * gain + (k + 1 < order - 1 ? zi[k + 1] : 0);
  }
  return zi;
}

/**
 * Extend a signal at both ends by point reflection about its end samples.
 */
function oddExtend(data: readonly number[], padLen: number): number[] {
  const n = data.length;
  const first = data[0];
  const last = data[n - 1];
  const extended: number[] = [];

  for (let i = padLen; i > 0; i--) {
    extended.push(2 * first - data[i]);
  }
  extended.push(...data);
  for (let i = 1; i <= padLen; i++) {
    extended.push(2 * last - data[n - 1 - i]);
  }

  return extended;
}

/**
 * Run one filter section over a signal, starting from state `zi`.
 *
 * Direct Form II Transposed; `sosfilt` chains one call per section. The
 * final state is returned alongside the output so a run can be resumed.
 *
 * @param zi Starting state, max(b.length, a.length) - 1 values; shorter
 *   arrays are zero-padded
 */
export function lfilterWithZi(
  data: readonly number[],
  b: number[],
  a: number[],
  zi: number[]
): { y: number[]; zf: number[] } {
  if (data.length === 0 || b.length === 0 || a.length === 0) {
    return { y: [...data], zf: [...zi] };
  }

  const output = new Array<number>(data.length).fill(0);
  const order = Math.max(b.length, a.length);

  // State variables (copy initial conditions)
  const z = [...zi];
  while (z.length < order) z.push(0);

  for (let i = 0; i < data.length; i++) {
    output[i] = b[0] * data[i] + z[0];

    for (let j = 0; j < order - 1; j++) {
      const bCoeff = j < b.length - 1 ? b[j + 1] : 0.0;
      const aCoeff = j < a.length - 1 ? a[j + 1] : 0.0;
      z[j] = bCoeff * data[i] - aCoeff * output[i];
      if (j + 1 < order - 1) {
        z[j] += z[j + 1];
      }
    }
  }

  return { y: output, zf: z.slice(0, order - 1) };
}
