import { ExtractedPlotData } from '../../plot-data/interfaces/plot-data.interface';
import {
  PlotEvaluation,
  PlotMetricWeights,
  SkipHistogram,
  SubplotEvaluation,
} from '../interfaces/evaluation.interface';
import { bounded, incomparable, Metric, MetricResult } from '../interfaces/metric.interface';
import { ExactSeriesMatcher } from '../matching/exact-series.matcher';
import { SeriesMatcher } from '../matching/series-matcher.interface';
import {
  CurveSimilarityScorer,
  DEFAULT_PRECISION,
  DEFAULT_RMSE_CUTOFF,
  emptySkipHistogram,
  MatchedSeries,
} from './curve-similarity';
import { scoreMetadata } from './metadata-scorer';

export const DEFAULT_PLOT_METRIC_WEIGHTS: Readonly<PlotMetricWeights> = Object.freeze({
  metadata: 0.2,
  series: 0.2,
  numerical: 0.6,
});

export interface PlotDataMetricConfig {
  // Expected to sum to 1.0; not enforced here
  weights: PlotMetricWeights;
  precision: number;
  rmseCutoff: number;
  matcher: SeriesMatcher;
}

/**
 * Composite 0-1 score for structured digitizations. Subplots are paired by
 * position, so the extractor must emit them in the reference order.
 */
export class PlotDataMetric implements Metric<readonly ExtractedPlotData[]> {
  readonly name = 'plot-data';

  private readonly weights: PlotMetricWeights;
  private readonly matcher: SeriesMatcher;
  private readonly curveScorer: CurveSimilarityScorer;

  constructor(config: Partial<PlotDataMetricConfig> = {}) {
    this.weights = { ...(config.weights ?? DEFAULT_PLOT_METRIC_WEIGHTS) };
    this.matcher = config.matcher ?? new ExactSeriesMatcher();
    this.curveScorer = new CurveSimilarityScorer({
      precision: config.precision ?? DEFAULT_PRECISION,
      rmseCutoff: config.rmseCutoff ?? DEFAULT_RMSE_CUTOFF,
    });
  }

  score(predicted: readonly ExtractedPlotData[], reference: readonly ExtractedPlotData[]): number {
    return this.evaluate(predicted, reference).score;
  }

  compute(predicted: readonly ExtractedPlotData[], reference: readonly ExtractedPlotData[]): MetricResult {
    return this.evaluate(predicted, reference).result;
  }

  evaluate(predicted: readonly ExtractedPlotData[], reference: readonly ExtractedPlotData[]): PlotEvaluation {
    const skipped = emptySkipHistogram();

    if (predicted.length === 0 || reference.length === 0) {
      return {
        result: incomparable(predicted.length === 0 ? 'no predicted subplots' : 'no reference subplots'),
        score: 0.0,
        subplots: [],
        skipped,
        unpairedPredicted: predicted.length,
        unpairedReference: reference.length,
      };
    }

    const pairedCount = Math.min(predicted.length, reference.length);
    const subplots: SubplotEvaluation[] = [];
    for (let index = 0; index < pairedCount; index++) {
      const subplot = this.evaluateSubplot(index, predicted[index], reference[index]);
      addSkips(skipped, subplot);
      subplots.push(subplot);
    }

    const score = subplots.reduce((sum, s) => sum + s.score, 0) / subplots.length;
    return {
      result: bounded(score),
      score,
      subplots,
      skipped,
      unpairedPredicted: predicted.length - pairedCount,
      unpairedReference: reference.length - pairedCount,
    };
  }

  private evaluateSubplot(
    index: number,
    predicted: ExtractedPlotData,
    reference: ExtractedPlotData,
  ): SubplotEvaluation {
    const metadataScore = scoreMetadata(predicted.metadata, reference.metadata);

    const { pairs, matchFraction } = this.matcher.match(
      predicted.dataSeries.map((s) => s.name),
      reference.dataSeries.map((s) => s.name),
    );

    const predictedByName = new Map(predicted.dataSeries.map((s) => [s.name, s]));
    const referenceByName = new Map(reference.dataSeries.map((s) => [s.name, s]));
    const matched: MatchedSeries[] = [];
    for (const pair of pairs) {
      const p = predictedByName.get(pair.predicted);
      const r = referenceByName.get(pair.reference);
      if (p && r) {
        matched.push({ predicted: p, reference: r });
      }
    }

    const curves = this.curveScorer.score(matched);
    const score =
      this.weights.metadata * metadataScore +
      this.weights.series * matchFraction +
      this.weights.numerical * curves.numericalScore;

    return {
      index,
      score,
      metadataScore,
      matchFraction,
      numericalScore: curves.numericalScore,
      averageRmse: curves.averageRmse,
      matchedSeries: pairs,
      series: curves.series,
    };
  }
}

function addSkips(histogram: SkipHistogram, subplot: SubplotEvaluation): void {
  for (const outcome of subplot.series) {
    if (outcome.status === 'skipped') {
      histogram[outcome.reason]++;
    }
  }
}
