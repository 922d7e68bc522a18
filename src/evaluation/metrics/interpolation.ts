/**
 * Evenly spaced grid 0, step, 2*step, ... up to and including 1.0 when step
 * divides it.
 */
export function unitGrid(step: number): number[] {
  const steps = Math.floor(1 / step + 1e-9);
  return Array.from({ length: steps + 1 }, (_, i) => i * step);
}

/**
 * Piecewise-linear interpolation of (xs, ys) at x. xs must be sorted
 * ascending; values outside [xs[0], xs[last]] take the nearest endpoint.
 */
export function interpolate(x: number, xs: readonly number[], ys: readonly number[]): number {
  const last = xs.length - 1;
  if (x <= xs[0]) return ys[0];
  if (x >= xs[last]) return ys[last];

  // last index with xs[lo] <= x
  let lo = 0;
  let hi = last;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (xs[mid] <= x) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  const span = xs[hi] - xs[lo];
  return ys[lo] + ((x - xs[lo]) * (ys[hi] - ys[lo])) / span;
}

export function rootMeanSquare(differences: readonly number[]): number {
  if (differences.length === 0) return 0;
  const sumOfSquares = differences.reduce((sum, d) => sum + d * d, 0);
  return Math.sqrt(sumOfSquares / differences.length);
}
