import { Injectable } from '@nestjs/common';
import { traceable } from 'langsmith/traceable';
import {
  LLMProvider,
  LLMProviderType,
  LLMRequest,
  LLMResponse,
  LLMTokenUsage,
  ModelUsage,
} from './interfaces/llm.interface';
import { GeminiProvider } from './providers/gemini.provider';
import { ModelSelectorService } from './model-selector.service';
import { debugLog } from '../common/debug-logger';

@Injectable()
export class LLMService {
  private providers: Map<LLMProviderType, LLMProvider> = new Map();
  private defaultProvider: LLMProviderType = LLMProviderType.GEMINI;
  private tokenUsageByModel: Record<string, LLMTokenUsage> = {};

  constructor(
    private readonly geminiProvider: GeminiProvider,
    private readonly modelSelector: ModelSelectorService,
  ) {
    this.providers.set(LLMProviderType.GEMINI, geminiProvider);
    debugLog('LLM Service initialized with providers:', Array.from(this.providers.keys()));
  }

  async generateContent(request: LLMRequest, providerType?: LLMProviderType): Promise<LLMResponse> {
    return traceable(
      async (request: LLMRequest, providerType?: LLMProviderType): Promise<LLMResponse> => {
        const provider = this.getProvider(providerType);

        debugLog('Generating content with provider:', provider.name, {
          promptLength: request.prompt.length,
          model: request.model,
        });

        const result = await provider.generateContent(request);
        this.trackTokenUsage(result, request.model || 'unknown');
        return result;
      },
      { run_type: 'llm' },
    )(request, providerType);
  }

  private getProvider(providerType?: LLMProviderType): LLMProvider {
    const targetProvider = providerType || this.defaultProvider;
    const provider = this.providers.get(targetProvider);

    if (!provider) {
      throw new Error(`LLM provider '${targetProvider}' not found`);
    }
    if (!provider.isAvailable()) {
      throw new Error(`LLM provider '${targetProvider}' is not configured`);
    }

    return provider;
  }

  async generateContentForUsage(request: Omit<LLMRequest, 'model'>, usage: ModelUsage): Promise<LLMResponse> {
    const provider = this.modelSelector.getProviderForUsage(usage);
    const model = this.modelSelector.getModelForUsage(usage);

    this.modelSelector.logModelSelection(usage);

    return this.generateContent({ ...request, model }, provider);
  }

  async extractPlotData(request: Omit<LLMRequest, 'model'>): Promise<LLMResponse> {
    return this.generateContentForUsage(request, ModelUsage.PLOT_DATA_EXTRACTION);
  }

  async extractLinePlotData(request: Omit<LLMRequest, 'model'>): Promise<LLMResponse> {
    return this.generateContentForUsage(request, ModelUsage.LINE_PLOT_EXTRACTION);
  }

  private trackTokenUsage(result: LLMResponse, modelName: string): void {
    const usage = result.usage;
    if (!usage) {
      debugLog(`No token usage information available for model: ${modelName}`);
      return;
    }

    const running = this.tokenUsageByModel[modelName] ?? { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
    running.inputTokens += usage.inputTokens;
    running.outputTokens += usage.outputTokens;
    running.totalTokens += usage.totalTokens || usage.inputTokens + usage.outputTokens;
    this.tokenUsageByModel[modelName] = running;

    debugLog(`Token usage tracked for ${modelName}:`, { ...usage, runningTotal: running });
  }

  /**
   * Gets the current token usage by model and resets the counters
   */
  getAndResetTokenUsage(): Record<string, LLMTokenUsage> {
    const usage = { ...this.tokenUsageByModel };
    this.tokenUsageByModel = {};
    debugLog('Token usage retrieved and reset:', usage);
    return usage;
  }
}
