import { BadRequestException, Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import { ZodType, ZodTypeDef } from 'zod';
import { formatZodIssues } from '../plot-data/plot-data.errors';
import { createExtractedPlotData, createLinePlotData } from '../plot-data/plot-data.factory';
import { EvaluationService } from './evaluation.service';
import { evaluatePlotsRequestSchema, evaluatePointsRequestSchema } from './dto/evaluation-request.schema';
import { EvaluationSettings, PlotEvaluation, PointEvaluation } from './interfaces/evaluation.interface';

@Controller('evaluation')
export class EvaluationController {
  constructor(private readonly evaluationService: EvaluationService) {}

  private parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException({
        message: 'Invalid request body',
        issues: formatZodIssues(parsed.error),
      });
    }
    return parsed.data;
  }

  @Get('config')
  getConfig(): EvaluationSettings {
    return this.evaluationService.getSettings();
  }

  /**
   * Composite score for structured digitizations, paired by subplot index
   */
  @Post('plots')
  @HttpCode(200)
  evaluatePlots(@Body() body: unknown): PlotEvaluation {
    const request = this.parseBody(evaluatePlotsRequestSchema, body);
    return this.evaluationService.evaluatePlots(
      request.predicted.map(createExtractedPlotData),
      request.reference.map(createExtractedPlotData),
    );
  }

  /**
   * Nearest-neighbor distance for name -> coordinates digitizations
   */
  @Post('points')
  @HttpCode(200)
  evaluatePoints(@Body() body: unknown): PointEvaluation {
    const request = this.parseBody(evaluatePointsRequestSchema, body);
    const predicted = createLinePlotData({ nameToCoordinates: request.predicted });
    const reference = createLinePlotData({ nameToCoordinates: request.reference });
    return this.evaluationService.evaluatePoints(
      predicted.nameToCoordinates,
      reference.nameToCoordinates,
      request.errorMetric,
    );
  }
}
