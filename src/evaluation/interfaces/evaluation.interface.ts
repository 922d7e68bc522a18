import { MetricResult } from './metric.interface';
import { SeriesMatchingStrategy } from '../matching/series-matcher.interface';

export type SkipReason = 'empty-series' | 'zero-range' | 'insufficient-x-span';

export type SeriesOutcome =
  | { status: 'scored'; predicted: string; reference: string; rmse: number }
  | { status: 'skipped'; predicted: string; reference: string; reason: SkipReason };

export type SkipHistogram = Record<SkipReason, number>;

export interface CurveSimilarityResult {
  numericalScore: number;
  // null when no series could be scored
  averageRmse: number | null;
  series: SeriesOutcome[];
  skipped: SkipHistogram;
}

export interface PlotMetricWeights {
  metadata: number;
  series: number;
  numerical: number;
}

export interface SubplotEvaluation {
  index: number;
  score: number;
  metadataScore: number;
  matchFraction: number;
  numericalScore: number;
  averageRmse: number | null;
  matchedSeries: Array<{ predicted: string; reference: string }>;
  series: SeriesOutcome[];
}

export interface PlotEvaluation {
  result: MetricResult;
  // Legacy scalar: 0.0 when the input lists cannot be compared
  score: number;
  subplots: SubplotEvaluation[];
  skipped: SkipHistogram;
  unpairedPredicted: number;
  unpairedReference: number;
}

export type PointErrorMetric = 'rmse' | 'mae';

export interface PointEvaluation {
  result: MetricResult;
  // null when no series could be compared
  distance: number | null;
  errorMetric: PointErrorMetric;
  perSeries: Record<string, number>;
  missingSeries: string[];
  extraSeries: string[];
  unscorableSeries: string[];
}

export interface EvaluationSettings {
  weights: PlotMetricWeights;
  precision: number;
  rmseCutoff: number;
  seriesMatching: SeriesMatchingStrategy;
  seriesMatchThreshold: number;
  pointErrorMetric: PointErrorMetric;
}
