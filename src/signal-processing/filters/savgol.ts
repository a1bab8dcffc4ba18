/**
 * Savitzky-Golay Filter
 *
 * Least-squares polynomial smoothing. Preserves peak height and width
 * better than a moving average of the same length, which matters for
 * fiber volley and population spike amplitudes.
 */
import { invalidParameter } from '../../errors';

/**
 * Savitzky-Golay smoothing.
 *
 * Each interior sample is replaced by the value at the centre of a
 * polynomial fitted to the surrounding window. The first and last
 * `windowSize / 2` samples take their values from the polynomial fitted to
 * the first and last full window.
 *
 * @param data Input signal
 * @param windowSize Window length, must be odd and greater than polyOrder
 * @param polyOrder Polynomial order
 * @returns Smoothed signal with the same length as input
 * @throws AnalysisError (invalidParameter) for an even window, a window not
 *   above the polynomial order, or a signal shorter than the window
 */
export function savgolFilter(
  data: readonly number[],
  windowSize: number = 11,
  polyOrder: number = 3
): number[] {
  if (!Number.isInteger(windowSize) || !Number.isInteger(polyOrder) || polyOrder < 0) {
    throw invalidParameter(
      'savgol',
      `window size and polynomial order must be non-negative integers (got ${windowSize}, ${polyOrder})`
    );
  }
  if (windowSize % 2 === 0) {
    throw invalidParameter('savgol', `window size must be odd (got ${windowSize})`);
  }
  if (windowSize <= polyOrder) {
    throw invalidParameter(
      'savgol',
      `window size must exceed polynomial order (got window size ${windowSize}, polynomial order ${polyOrder})`
    );
  }
  if (data.length === 0) return [];
  if (data.length < windowSize) {
    throw invalidParameter(
      'savgol',
      `signal length ${data.length} is shorter than the window size ${windowSize}`
    );
  }

  const n = data.length;
  const halfWindow = (windowSize - 1) / 2;
  const projection = computeProjection(windowSize, polyOrder);
  const result = new Array<number>(n);

  const center = projection[halfWindow];
  for (let i = halfWindow; i < n - halfWindow; i++) {
    let acc = 0;
    for (let j = 0; j < windowSize; j++) {
      acc += center[j] * data[i - halfWindow + j];
    }
    result[i] = acc;
  }

  // Edges: evaluate the first/last window's polynomial at the missing positions
  const tailStart = n - windowSize;
  for (let k = 0; k < halfWindow; k++) {
    let head = 0;
    let tail = 0;
    const headRow = projection[k];
    const tailRow = projection[windowSize - halfWindow + k];
    for (let j = 0; j < windowSize; j++) {
      head += headRow[j] * data[j];
      tail += tailRow[j] * data[tailStart + j];
    }
    result[k] = head;
    result[n - halfWindow + k] = tail;
  }

  return result;
}

/**
 * Hat matrix A (AᵀA)⁻¹ Aᵀ of a polynomial fit over one window.
 *
 * Row j gives the weights that produce the fitted value at window position j.
 */
function computeProjection(windowSize: number, polyOrder: number): number[][] {
  const halfWindow = (windowSize - 1) / 2;
  const scale = Math.max(halfWindow, 1);
  const terms = polyOrder + 1;

  // Vandermonde matrix on positions scaled to [-1, 1]
  const vander: number[][] = [];
  for (let i = 0; i < windowSize; i++) {
    const t = (i - halfWindow) / scale;
    const row: number[] = [];
    let p = 1;
    for (let k = 0; k < terms; k++) {
      row.push(p);
      p *= t;
    }
    vander.push(row);
  }

  const normal: number[][] = [];
  for (let r = 0; r < terms; r++) {
    const row: number[] = [];
    for (let c = 0; c < terms; c++) {
      let acc = 0;
      for (let i = 0; i < windowSize; i++) acc += vander[i][r] * vander[i][c];
      row.push(acc);
    }
    normal.push(row);
  }

  const inverse = invert(normal);

  const projection: number[][] = [];
  for (let j = 0; j < windowSize; j++) {
    // w_j = A_j (AᵀA)⁻¹
    const w: number[] = [];
    for (let c = 0; c < terms; c++) {
      let acc = 0;
      for (let r = 0; r < terms; r++) acc += vander[j][r] * inverse[r][c];
      w.push(acc);
    }
    const row: number[] = [];
    for (let i = 0; i < windowSize; i++) {
      let acc = 0;
      for (let c = 0; c < terms; c++) acc += w[c] * vander[i][c];
      row.push(acc);
    }
    projection.push(row);
  }

  return projection;
}

/**
 * Gauss-Jordan inversion with partial pivoting.
 */
function invert(matrix: number[][]): number[][] {
  const size = matrix.length;
  const work = matrix.map((row, i) => [
    ...row,
    ...Array.from({ length: size }, (_, j) => (i === j ? 1 : 0)),
  ]);

  for (let col = 0; col < size; col++) {
    let pivot = col;
    for (let r = col + 1; r < size; r++) {
      if (Math.abs(work[r][col]) > Math.abs(work[pivot][col])) pivot = r;
    }
    if (Math.abs(work[pivot][col]) < 1e-12) {
      throw invalidParameter('savgol', 'polynomial fit is singular for this window');
    }
    [work[col], work[pivot]] = [work[pivot], work[col]];

    const pivotValue = work[col][col];
    for (let c = 0; c < 2 * size; c++) work[col][c] /= pivotValue;

    for (let r = 0; r < size; r++) {
      if (r === col) continue;
      const factor = work[r][col];
      if (factor === 0) continue;
      for (let c = 0; c < 2 * size; c++) work[r][c] -= factor * work[col][c];
    }
  }

  return work.map((row) => row.slice(size));
}
