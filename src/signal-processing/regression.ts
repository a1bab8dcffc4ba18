/**
 * Linear Regression
 */
import type { LinearFitResult } from './types';

/**
 * Ordinary least-squares straight line through (x, y).
 *
 * @returns slope, intercept and R². Slope and intercept are NaN when the
 *   line is undetermined (fewer than two points, or all x equal); R² is NaN
 *   when y is constant.
 */
export function linearFit(x: readonly number[], y: readonly number[]): LinearFitResult {
  const n = Math.min(x.length, y.length);
  if (n < 2) {
    return { slope: NaN, intercept: NaN, rSquared: NaN };
  }

  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i++) {
    sumX += x[i];
    sumY += y[i];
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let sxx = 0;
  let sxy = 0;
  let ssTot = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - meanX;
    const dy = y[i] - meanY;
    sxx += dx * dx;
    sxy += dx * dy;
    ssTot += dy * dy;
  }

  if (sxx === 0) {
    return { slope: NaN, intercept: NaN, rSquared: NaN };
  }

  const slope = sxy / sxx;
  const intercept = meanY - slope * meanX;

  let ssRes = 0;
  for (let i = 0; i < n; i++) {
    const residual = y[i] - (slope * x[i] + intercept);
    ssRes += residual * residual;
  }

  const rSquared = ssTot > 0 ? 1 - ssRes / ssTot : NaN;
  return { slope, intercept, rSquared };
}
