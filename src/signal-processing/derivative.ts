/**
 * Derivatives and Integrals
 */

/**
 * Derivative of y with respect to x.
 *
 * Interior points use the second-order central difference for (possibly)
 * uneven spacing; the two boundary points use one-sided first differences.
 *
 * @param y Sampled values
 * @param x Sample positions, strictly increasing, same length as y
 * @returns dy/dx with the same length as the input
 */
export function gradient(y: readonly number[], x: readonly number[]): number[] {
  const n = y.length;
  if (n !== x.length) {
    throw new RangeError(`gradient: y has ${n} samples but x has ${x.length}`);
  }
  if (n === 0) return [];
  if (n === 1) return [0];

  const dy = new Array<number>(n);
  dy[0] = (y[1] - y[0]) / (x[1] - x[0]);
  dy[n - 1] = (y[n - 1] - y[n - 2]) / (x[n - 1] - x[n - 2]);

  for (let i = 1; i < n - 1; i++) {
    const hl = x[i] - x[i - 1];
    const hr = x[i + 1] - x[i];
    dy[i] =
      (hl * hl * y[i + 1] - hr * hr * y[i - 1] + (hr * hr - hl * hl) * y[i]) /
      (hl * hr * (hl + hr));
  }

  return dy;
}

/**
 * Area under the curve by the trapezoid rule.
 */
export function trapz(y: readonly number[], x: readonly number[]): number {
  const n = Math.min(y.length, x.length);
  let area = 0;
  for (let i = 1; i < n; i++) {
    area += ((y[i] + y[i - 1]) * (x[i] - x[i - 1])) / 2;
  }
  return area;
}
