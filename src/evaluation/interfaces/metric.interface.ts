export type MetricResult =
  | { kind: 'bounded'; score: number }
  | { kind: 'unbounded'; distance: number }
  | { kind: 'incomparable'; reason: string };

/**
 * Common surface of the plot metrics. Bounded results live in [0, 1] with
 * higher being better; unbounded ones are distances where lower is better.
 */
export interface Metric<T> {
  readonly name: string;
  compute(predicted: T, reference: T): MetricResult;
}

export function bounded(score: number): MetricResult {
  return { kind: 'bounded', score };
}

export function unbounded(distance: number): MetricResult {
  return { kind: 'unbounded', distance };
}

export function incomparable(reason: string): MetricResult {
  return { kind: 'incomparable', reason };
}
