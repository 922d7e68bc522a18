import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { loadEvaluationSettings, weightsSumToOne } from '../config/evaluation.config';
import { debugLog } from '../common/debug-logger';
import { ExtractedPlotData } from '../plot-data/interfaces/plot-data.interface';
import {
  EvaluationSettings,
  PlotEvaluation,
  PointErrorMetric,
  PointEvaluation,
} from './interfaces/evaluation.interface';
import { createSeriesMatcher } from './matching/series-matcher.factory';
import { PlotDataMetric } from './metrics/plot-data.metric';
import { CoordinateMap, PointDistanceMetric } from './metrics/point-distance.metric';

@Injectable()
export class EvaluationService {
  private readonly logger = new Logger(EvaluationService.name);
  private readonly settings: EvaluationSettings;
  private readonly plotMetric: PlotDataMetric;
  private readonly pointMetric: PointDistanceMetric;

  constructor(private readonly configService: ConfigService) {
    this.settings = loadEvaluationSettings((key) => this.configService.get<string>(key));

    if (!weightsSumToOne(this.settings)) {
      this.logger.warn(
        `Plot metric weights do not sum to 1.0 (${JSON.stringify(this.settings.weights)}); scores may leave [0, 1]`,
      );
    }

    this.plotMetric = new PlotDataMetric({
      weights: this.settings.weights,
      precision: this.settings.precision,
      rmseCutoff: this.settings.rmseCutoff,
      matcher: createSeriesMatcher(this.settings.seriesMatching, this.settings.seriesMatchThreshold),
    });
    this.pointMetric = new PointDistanceMetric({ errorMetric: this.settings.pointErrorMetric });

    debugLog('EvaluationService initialized with settings:', this.settings);
  }

  getSettings(): EvaluationSettings {
    return this.settings;
  }

  /**
   * Scores structured digitizations, subplot by subplot
   */
  evaluatePlots(
    predicted: readonly ExtractedPlotData[],
    reference: readonly ExtractedPlotData[],
  ): PlotEvaluation {
    const evaluation = this.plotMetric.evaluate(predicted, reference);

    if (evaluation.result.kind === 'incomparable') {
      this.logger.warn(`Plot evaluation not possible: ${evaluation.result.reason}`);
      return evaluation;
    }

    const skippedCount = Object.values(evaluation.skipped).reduce((sum, n) => sum + n, 0);
    this.logger.log(
      `Scored ${evaluation.subplots.length} subplot(s): ${evaluation.score.toFixed(4)}` +
        (skippedCount > 0 ? ` (${skippedCount} series skipped)` : ''),
    );
    if (evaluation.unpairedPredicted > 0 || evaluation.unpairedReference > 0) {
      debugLog('Unpaired subplots:', {
        predicted: evaluation.unpairedPredicted,
        reference: evaluation.unpairedReference,
      });
    }
    if (skippedCount > 0) {
      debugLog('Skipped series by reason:', evaluation.skipped);
    }

    return evaluation;
  }

  /**
   * Nearest-neighbor distance between coordinate maps
   */
  evaluatePoints(
    predicted: CoordinateMap,
    reference: CoordinateMap,
    errorMetric?: PointErrorMetric,
  ): PointEvaluation {
    const evaluation = this.pointMetric.evaluate(predicted, reference, errorMetric);

    if (evaluation.missingSeries.length > 0) {
      this.logger.log(`Series missing in prediction: ${evaluation.missingSeries.join(', ')}`);
    }
    if (evaluation.result.kind === 'incomparable') {
      this.logger.warn(`Point evaluation not possible: ${evaluation.result.reason}`);
    } else {
      debugLog(`Point distance (${evaluation.errorMetric}):`, evaluation.distance, evaluation.perSeries);
    }

    return evaluation;
  }
}
