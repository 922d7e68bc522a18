import { Coordinate } from '../../plot-data/interfaces/plot-data.interface';
import { PointErrorMetric, PointEvaluation } from '../interfaces/evaluation.interface';
import { incomparable, Metric, MetricResult, unbounded } from '../interfaces/metric.interface';

export type CoordinateMap = Readonly<Record<string, readonly Coordinate[]>>;

export interface PointDistanceMetricConfig {
  errorMetric: PointErrorMetric;
  // Floor for a zero-width reference axis
  epsilon: number;
}

interface Scale {
  x: number;
  y: number;
}

/**
 * Nearest-neighbor distance between two name -> [x, y][] digitizations.
 *
 * Every predicted point is matched to its closest reference point in the same
 * series, with coordinates divided by the reference's overall x and y ranges.
 * The result is an unbounded error (lower is better) and is not symmetric:
 * swapping the arguments changes the scale. Reference points with no
 * predicted neighbor are not penalised.
 */
export class PointDistanceMetric implements Metric<CoordinateMap> {
  readonly name = 'point-distance';

  private readonly config: PointDistanceMetricConfig;

  constructor(config: Partial<PointDistanceMetricConfig> = {}) {
    this.config = {
      errorMetric: config.errorMetric ?? 'rmse',
      epsilon: config.epsilon ?? 1e-8,
    };
  }

  score(predicted: CoordinateMap, reference: CoordinateMap, errorMetric?: PointErrorMetric): number | null {
    return this.evaluate(predicted, reference, errorMetric).distance;
  }

  compute(predicted: CoordinateMap, reference: CoordinateMap): MetricResult {
    return this.evaluate(predicted, reference).result;
  }

  evaluate(
    predicted: CoordinateMap,
    reference: CoordinateMap,
    errorMetric: PointErrorMetric = this.config.errorMetric,
  ): PointEvaluation {
    const predictedKeys = Object.keys(predicted);
    const referenceKeys = Object.keys(reference);
    const common = predictedKeys.filter((k) => Object.hasOwn(reference, k));
    const missingSeries = referenceKeys.filter((k) => !Object.hasOwn(predicted, k));
    const extraSeries = predictedKeys.filter((k) => !Object.hasOwn(reference, k));

    const base = { errorMetric, missingSeries, extraSeries };
    if (common.length === 0) {
      return {
        ...base,
        result: incomparable('no series in common'),
        distance: null,
        perSeries: {},
        unscorableSeries: [],
      };
    }

    const scale = this.referenceScale(reference);
    const perSeries: Record<string, number> = {};
    const unscorableSeries: string[] = [];
    for (const name of common) {
      if (reference[name].length === 0) {
        unscorableSeries.push(name);
        continue;
      }
      perSeries[name] = seriesError(predicted[name], reference[name], scale, errorMetric);
    }

    const errors = Object.values(perSeries);
    if (errors.length === 0) {
      return {
        ...base,
        result: incomparable('no common series has reference points'),
        distance: null,
        perSeries,
        unscorableSeries,
      };
    }

    const distance = errors.reduce((sum, e) => sum + e, 0) / errors.length;
    return { ...base, result: unbounded(distance), distance, perSeries, unscorableSeries };
  }

  private referenceScale(reference: CoordinateMap): Scale {
    let minX = Infinity;
    let maxX = -Infinity;
    let minY = Infinity;
    let maxY = -Infinity;
    for (const coordinates of Object.values(reference)) {
      for (const [x, y] of coordinates) {
        minX = Math.min(minX, x);
        maxX = Math.max(maxX, x);
        minY = Math.min(minY, y);
        maxY = Math.max(maxY, y);
      }
    }

    const floor = (range: number) => (Number.isFinite(range) && range > 0 ? range : this.config.epsilon);
    return { x: floor(maxX - minX), y: floor(maxY - minY) };
  }
}

function seriesError(
  predicted: readonly Coordinate[],
  reference: readonly Coordinate[],
  scale: Scale,
  errorMetric: PointErrorMetric,
): number {
  if (predicted.length === 0) {
    return 0.0;
  }

  let total = 0;
  for (const [px, py] of predicted) {
    let nearest = Infinity;
    for (const [rx, ry] of reference) {
      const dx = (rx - px) / scale.x;
      const dy = (ry - py) / scale.y;
      nearest = Math.min(nearest, dx * dx + dy * dy);
    }
    total += errorMetric === 'rmse' ? nearest : Math.sqrt(nearest);
  }

  const mean = total / predicted.length;
  return errorMetric === 'rmse' ? Math.sqrt(mean) : mean;
}
