import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GenerateContentResult, GoogleGenerativeAI } from '@google/generative-ai';
import { LLMProvider, LLMRequest, LLMResponse } from '../interfaces/llm.interface';
import { debugLog } from '../../common/debug-logger';
import { errorMessage } from '../../common/error-message';

const MAX_RETRIES = 3;

@Injectable()
export class GeminiProvider implements LLMProvider {
  public readonly name = 'gemini';
  private genAI: GoogleGenerativeAI | null = null;
  private defaultModel = 'gemini-2.5-flash';

  constructor(private readonly configService: ConfigService) {
    debugLog('Gemini provider initialized', {
      hasApiKey: this.isAvailable(),
      nodeEnv: this.configService.get<string>('NODE_ENV'),
    });
  }

  private getClient(): GoogleGenerativeAI {
    if (!this.genAI) {
      const apiKey = this.configService.get<string>('GEMINI_API_KEY');
      if (!apiKey) {
        throw new Error('GEMINI_API_KEY environment variable is required');
      }
      this.genAI = new GoogleGenerativeAI(apiKey);
    }
    return this.genAI;
  }

  async generateContent(request: LLMRequest): Promise<LLMResponse> {
    const modelName = request.model || this.defaultModel;
    debugLog('Gemini provider generating content with request:', {
      promptLength: request.prompt.length,
      model: modelName,
      hasSystemPrompt: !!request.systemPrompt,
      hasFileUpload: !!request.fileUpload,
    });

    try {
      const model = this.getClient().getGenerativeModel({
        model: modelName,
        generationConfig: {
          temperature: request.temperature ?? 0,
          maxOutputTokens: request.maxTokens || 8192,
        },
      });

      const prompt = request.systemPrompt
        ? `${request.systemPrompt}\n\n${request.prompt}`
        : request.prompt;

      let result: GenerateContentResult | undefined;
      for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
        try {
          debugLog(`Gemini API attempt ${attempt}/${MAX_RETRIES}`);

          if (request.fileUpload) {
            result = await model.generateContent([
              prompt,
              {
                inlineData: {
                  data: request.fileUpload.data.toString('base64'),
                  mimeType: request.fileUpload.mimeType,
                },
              },
            ]);
          } else {
            result = await model.generateContent(prompt);
          }

          debugLog(`Gemini API request succeeded on attempt ${attempt}`);
          break;
        } catch (error) {
          const message = errorMessage(error);
          debugLog(`Gemini API attempt ${attempt} failed:`, message);

          // Only network failures are worth retrying
          if (attempt === MAX_RETRIES || !message.includes('fetch failed')) {
            throw error;
          }

          const waitTime = Math.pow(2, attempt - 1) * 1000; // 1s, 2s, 4s
          debugLog(`Waiting ${waitTime}ms before retry...`);
          await new Promise((resolve) => setTimeout(resolve, waitTime));
        }
      }

      if (!result) {
        throw new Error('Gemini API request failed - no result received');
      }

      const response = result.response;
      const content = response.text();
      debugLog('Gemini response received successfully, content length:', content.length);

      const usageMetadata = response.usageMetadata;
      return {
        content,
        model: modelName,
        usage: usageMetadata
          ? {
              inputTokens: usageMetadata.promptTokenCount || 0,
              outputTokens: usageMetadata.candidatesTokenCount || 0,
              totalTokens: usageMetadata.totalTokenCount || 0,
            }
          : undefined,
      };
    } catch (error) {
      const message = errorMessage(error);
      console.error('Gemini provider error details:', {
        message,
        stack: error instanceof Error ? error.stack : undefined,
      });

      let errorText = `Gemini API error: ${message}`;
      if (message.includes('fetch failed')) {
        errorText += ' (Network connectivity issue - check internet connection and firewall settings)';
      }
      throw new Error(errorText);
    }
  }

  isAvailable(): boolean {
    return !!this.configService.get<string>('GEMINI_API_KEY');
  }
}
