export interface LLMFileUpload {
  data: Buffer;
  mimeType: string;
}

export interface LLMRequest {
  prompt: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
  fileUpload?: LLMFileUpload;
}

export interface LLMTokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string;
  usage?: LLMTokenUsage;
  model?: string;
}

export interface LLMProvider {
  name: string;
  generateContent(request: LLMRequest): Promise<LLMResponse>;
  isAvailable(): boolean;
}

export enum LLMProviderType {
  GEMINI = 'gemini',
}

export enum ModelUsage {
  PLOT_DATA_EXTRACTION = 'plot_data_extraction',
  LINE_PLOT_EXTRACTION = 'line_plot_extraction',
}
