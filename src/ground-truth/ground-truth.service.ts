import { Injectable } from '@nestjs/common';
import { promises as fs } from 'fs';
import { z } from 'zod';
import { debugLog } from '../common/debug-logger';
import { errorMessage } from '../common/error-message';
import { ExtractedPlotData, LinePlotData } from '../plot-data/interfaces/plot-data.interface';
import { formatZodIssues, PlotDataValidationError } from '../plot-data/plot-data.errors';
import {
  createExtractedPlotData,
  createLinePlotData,
  seriesFromCoordinates,
} from '../plot-data/plot-data.factory';
import { coordinateSchema } from '../plot-data/plot-data.schema';

const groundTruthSchema = z.object({
  subplots: z
    .array(
      z.object({
        coordinates: z.record(z.string(), z.array(coordinateSchema)),
        x_label: z.string().default(''),
        y_label: z.string().default(''),
      }),
    )
    .min(1, 'at least one subplot is required'),
});

type GroundTruthFile = z.infer<typeof groundTruthSchema>;

export class GroundTruthError extends Error {
  constructor(
    public readonly source: string,
    message: string,
  ) {
    super(`Ground truth ${source}: ${message}`);
    this.name = 'GroundTruthError';
  }
}

/**
 * Reads curated digitizations stored as
 * `{ "subplots": [{ "coordinates": { name: [[x, y], ...] }, "x_label", "y_label" }] }`.
 */
@Injectable()
export class GroundTruthService {
  async loadPlots(filePath: string): Promise<ExtractedPlotData[]> {
    return this.parsePlots(await this.readJson(filePath), filePath);
  }

  async loadLinePlots(filePath: string): Promise<LinePlotData[]> {
    return this.parseLinePlots(await this.readJson(filePath), filePath);
  }

  parsePlots(json: unknown, source = '<inline>'): ExtractedPlotData[] {
    const file = this.validate(json, source);

    return this.wrap(source, () =>
      file.subplots.map((subplot) =>
        createExtractedPlotData({
          metadata: {
            xAxisLabel: subplot.x_label,
            leftYAxisLabel: subplot.y_label,
            isDualAxis: false,
          },
          dataSeries: seriesFromCoordinates(subplot.coordinates),
          technicalTakeaways: [],
        }),
      ),
    );
  }

  parseLinePlots(json: unknown, source = '<inline>'): LinePlotData[] {
    const file = this.validate(json, source);

    return this.wrap(source, () =>
      file.subplots.map((subplot) =>
        createLinePlotData({
          nameToCoordinates: subplot.coordinates,
          xAxisLabel: subplot.x_label,
          yLeftAxisLabel: subplot.y_label,
        }),
      ),
    );
  }

  private async readJson(filePath: string): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new GroundTruthError(filePath, `could not be read (${errorMessage(error)})`);
    }

    try {
      const json: unknown = JSON.parse(text);
      debugLog(`Loaded ground truth from ${filePath}`);
      return json;
    } catch (error) {
      throw new GroundTruthError(filePath, `is not valid JSON (${errorMessage(error)})`);
    }
  }

  private validate(json: unknown, source: string): GroundTruthFile {
    const parsed = groundTruthSchema.safeParse(json);
    if (!parsed.success) {
      throw new GroundTruthError(source, formatZodIssues(parsed.error).join('; '));
    }

    const seriesCount = parsed.data.subplots.reduce((sum, s) => sum + Object.keys(s.coordinates).length, 0);
    if (seriesCount === 0) {
      throw new GroundTruthError(source, 'contains no data series');
    }
    return parsed.data;
  }

  private wrap<T>(source: string, build: () => T): T {
    try {
      return build();
    } catch (error) {
      if (error instanceof PlotDataValidationError) {
        throw new GroundTruthError(source, error.message);
      }
      throw error;
    }
  }
}
