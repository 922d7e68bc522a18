import { Injectable } from '@nestjs/common';
import { LLMService } from '../llm/llm.service';
import { debugLog } from '../common/debug-logger';
import { errorMessage } from '../common/error-message';
import { ExtractedPlotData, LinePlotData } from '../plot-data/interfaces/plot-data.interface';
import { FigureInput, PlotExtractionResult } from './interfaces/figure.interface';
import { parseLinePlotResponse, parseStructuredPlotResponse } from './plot-extraction.parser';
import { linePlotPrompt, structuredPlotPrompt } from './plot-extraction.prompts';

@Injectable()
export class PlotExtractionService {
  constructor(private readonly llmService: LLMService) {}

  /**
   * Digitizes a figure into one ExtractedPlotData per subplot
   */
  async extractPlotData(
    figure: FigureInput,
    subplotCount = 1,
  ): Promise<PlotExtractionResult<ExtractedPlotData[]>> {
    debugLog(`Extracting structured plot data for figure ${figure.id} (${subplotCount} subplot(s))`);

    try {
      const response = await this.llmService.extractPlotData({
        prompt: structuredPlotPrompt(figure.context, subplotCount),
        fileUpload: { data: figure.imageBuffer, mimeType: figure.mimeType },
      });

      const plots = parseStructuredPlotResponse(response.content);
      const errors: string[] = [];
      if (plots.length !== subplotCount) {
        errors.push(`Expected ${subplotCount} subplot(s), model returned ${plots.length}`);
      }

      debugLog(`Extracted ${plots.length} subplot(s) for figure ${figure.id}`);
      return { figureId: figure.id, data: plots, errors, model: response.model };
    } catch (error) {
      console.error(`Error extracting plot data for figure ${figure.id}:`, error);
      return { figureId: figure.id, data: null, errors: [errorMessage(error)] };
    }
  }

  /**
   * Digitizes a line chart into a series name -> coordinates map
   */
  async extractLinePlotData(figure: FigureInput): Promise<PlotExtractionResult<LinePlotData>> {
    debugLog(`Extracting line plot coordinates for figure ${figure.id}`);

    try {
      const response = await this.llmService.extractLinePlotData({
        prompt: linePlotPrompt(figure.context),
        fileUpload: { data: figure.imageBuffer, mimeType: figure.mimeType },
      });

      const data = parseLinePlotResponse(response.content);
      debugLog(`Extracted ${Object.keys(data.nameToCoordinates).length} series for figure ${figure.id}`);
      return { figureId: figure.id, data, errors: [], model: response.model };
    } catch (error) {
      console.error(`Error extracting line plot data for figure ${figure.id}:`, error);
      return { figureId: figure.id, data: null, errors: [errorMessage(error)] };
    }
  }
}
