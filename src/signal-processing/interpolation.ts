/**
 * Interpolation Utilities
 */

/**
 * Linear interpolation between two points.
 * @param x0 First x value
 * @param y0 First y value (at x0)
 * @param x1 Second x value
 * @param y1 Second y value (at x1)
 * @param x Target x value to interpolate
 */
export function lerp(x0: number, y0: number, x1: number, y1: number, x: number): number {
  if (Math.abs(x1 - x0) < 1e-12) return y0;
  return y0 + ((y1 - y0) * (x - x0)) / (x1 - x0);
}
