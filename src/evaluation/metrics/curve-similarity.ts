import { DataSeries } from '../../plot-data/interfaces/plot-data.interface';
import {
  CurveSimilarityResult,
  SeriesOutcome,
  SkipHistogram,
  SkipReason,
} from '../interfaces/evaluation.interface';
import { interpolate, rootMeanSquare, unitGrid } from './interpolation';

export const DEFAULT_PRECISION = 0.1;
export const DEFAULT_RMSE_CUTOFF = 0.1;

export interface CurveSimilarityConfig {
  precision: number;
  rmseCutoff: number;
}

export interface MatchedSeries {
  predicted: DataSeries;
  reference: DataSeries;
}

interface NormalizedCurve {
  xs: number[];
  ys: number[];
}

type CurveComparison = { rmse: number } | { skip: SkipReason };

export function emptySkipHistogram(): SkipHistogram {
  return { 'empty-series': 0, 'zero-range': 0, 'insufficient-x-span': 0 };
}

/**
 * Compares matched series as continuous curves. Both series are rescaled into
 * the unit square using their joint bounding box, sorted by x and resampled on
 * a fixed grid, so point counts, point order and absolute scale do not matter.
 */
export class CurveSimilarityScorer {
  private readonly config: CurveSimilarityConfig;
  private readonly grid: number[];

  constructor(config: Partial<CurveSimilarityConfig> = {}) {
    this.config = {
      precision: config.precision ?? DEFAULT_PRECISION,
      rmseCutoff: config.rmseCutoff ?? DEFAULT_RMSE_CUTOFF,
    };
    this.grid = unitGrid(this.config.precision);
  }

  score(matched: readonly MatchedSeries[]): CurveSimilarityResult {
    const series: SeriesOutcome[] = [];
    const skipped = emptySkipHistogram();
    let totalRmse = 0;
    let scoredCount = 0;

    for (const { predicted, reference } of matched) {
      const names = { predicted: predicted.name, reference: reference.name };
      const comparison = this.compare(predicted, reference);

      if ('skip' in comparison) {
        skipped[comparison.skip]++;
        series.push({ status: 'skipped', ...names, reason: comparison.skip });
        continue;
      }

      totalRmse += comparison.rmse;
      scoredCount++;
      series.push({ status: 'scored', ...names, rmse: comparison.rmse });
    }

    if (scoredCount === 0) {
      return { numericalScore: 0.0, averageRmse: null, series, skipped };
    }

    const averageRmse = totalRmse / scoredCount;
    return {
      numericalScore: Math.max(0, 1 - averageRmse / this.config.rmseCutoff),
      averageRmse,
      series,
      skipped,
    };
  }

  private compare(predicted: DataSeries, reference: DataSeries): CurveComparison {
    if (predicted.points.length === 0 || reference.points.length === 0) {
      return { skip: 'empty-series' };
    }

    let minX = Infinity;
    let maxX = -Infinity;
    let minY = Infinity;
    let maxY = -Infinity;
    for (const { x, y } of [predicted.points, reference.points].flat()) {
      minX = Math.min(minX, x);
      maxX = Math.max(maxX, x);
      minY = Math.min(minY, y);
      maxY = Math.max(maxY, y);
    }
    const rangeX = maxX - minX;
    const rangeY = maxY - minY;
    if (rangeX === 0 || rangeY === 0) {
      return { skip: 'zero-range' };
    }

    const normalize = (s: DataSeries): NormalizedCurve => {
      const sorted = s.points
        .map((p) => ({ x: (p.x - minX) / rangeX, y: (p.y - minY) / rangeY }))
        .sort((a, b) => a.x - b.x);
      return { xs: sorted.map((p) => p.x), ys: sorted.map((p) => p.y) };
    };

    const predictedCurve = normalize(predicted);
    const referenceCurve = normalize(reference);
    if (!this.spansGrid(predictedCurve) || !this.spansGrid(referenceCurve)) {
      return { skip: 'insufficient-x-span' };
    }

    const differences = this.grid.map(
      (x) =>
        interpolate(x, predictedCurve.xs, predictedCurve.ys) -
        interpolate(x, referenceCurve.xs, referenceCurve.ys),
    );
    return { rmse: rootMeanSquare(differences) };
  }

  private spansGrid(curve: NormalizedCurve): boolean {
    return curve.xs[curve.xs.length - 1] - curve.xs[0] >= this.config.precision;
  }
}
