import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LLMProviderType, ModelUsage } from './interfaces/llm.interface';
import { debugLog } from '../common/debug-logger';

const DEFAULT_VISION_MODEL = 'gemini-2.5-flash';

@Injectable()
export class ModelSelectorService {
  constructor(private readonly configService: ConfigService) {}

  getModelForUsage(usage: ModelUsage): string {
    switch (usage) {
      case ModelUsage.PLOT_DATA_EXTRACTION:
        return this.configService.get<string>('GEMINI_PLOT_EXTRACTION_MODEL') || DEFAULT_VISION_MODEL;

      case ModelUsage.LINE_PLOT_EXTRACTION:
        return this.configService.get<string>('GEMINI_LINE_PLOT_MODEL') || DEFAULT_VISION_MODEL;

      default:
        debugLog('Unknown model usage:', usage, 'falling back to default vision model');
        return DEFAULT_VISION_MODEL;
    }
  }

  getProviderForUsage(_usage: ModelUsage): LLMProviderType {
    // Image input is only wired up for Gemini
    return LLMProviderType.GEMINI;
  }

  logModelSelection(usage: ModelUsage): void {
    debugLog(`Model selection for ${usage}:`, {
      provider: this.getProviderForUsage(usage),
      model: this.getModelForUsage(usage),
    });
  }
}
