import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { GeminiProvider } from './gemini.provider';

const mockGenerateContent = jest.fn();
const mockGetGenerativeModel = jest.fn(() => ({ generateContent: mockGenerateContent }));

jest.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: jest.fn().mockImplementation(() => ({
    getGenerativeModel: mockGetGenerativeModel,
  })),
}));

function reply(text: string) {
  return {
    response: {
      text: () => text,
      usageMetadata: { promptTokenCount: 120, candidatesTokenCount: 30, totalTokenCount: 150 },
    },
  };
}

async function createProvider(env: Record<string, string>): Promise<GeminiProvider> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      GeminiProvider,
      {
        provide: ConfigService,
        useValue: { get: jest.fn((key: string) => env[key]) },
      },
    ],
  }).compile();

  return module.get<GeminiProvider>(GeminiProvider);
}

describe('GeminiProvider', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should report availability from the API key', async () => {
    expect((await createProvider({ GEMINI_API_KEY: 'test-key' })).isAvailable()).toBe(true);
    expect((await createProvider({})).isAvailable()).toBe(false);
  });

  it('should fail without an API key', async () => {
    const provider = await createProvider({});

    await expect(provider.generateContent({ prompt: 'hi' })).rejects.toThrow(
      'Gemini API error: GEMINI_API_KEY environment variable is required',
    );
  });

  it('should send the image inline and return content with usage', async () => {
    mockGenerateContent.mockResolvedValue(reply('{"subplots": []}'));
    const provider = await createProvider({ GEMINI_API_KEY: 'test-key' });

    const response = await provider.generateContent({
      prompt: 'Digitize this plot',
      model: 'gemini-test',
      fileUpload: { data: Buffer.from('png-bytes'), mimeType: 'image/png' },
    });

    expect(response).toEqual({
      content: '{"subplots": []}',
      model: 'gemini-test',
      usage: { inputTokens: 120, outputTokens: 30, totalTokens: 150 },
    });
    expect(mockGetGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-test',
      generationConfig: { temperature: 0, maxOutputTokens: 8192 },
    });
    expect(mockGenerateContent).toHaveBeenCalledWith([
      'Digitize this plot',
      { inlineData: { data: Buffer.from('png-bytes').toString('base64'), mimeType: 'image/png' } },
    ]);
  });

  it('should prepend the system prompt to a text request', async () => {
    mockGenerateContent.mockResolvedValue(reply('ok'));
    const provider = await createProvider({ GEMINI_API_KEY: 'test-key' });

    await provider.generateContent({ prompt: 'Question', systemPrompt: 'Be brief' });

    expect(mockGenerateContent).toHaveBeenCalledWith('Be brief\n\nQuestion');
    expect(mockGetGenerativeModel).toHaveBeenCalledWith(
      expect.objectContaining({ model: 'gemini-2.5-flash' }),
    );
  });

  it('should retry network failures', async () => {
    mockGenerateContent.mockRejectedValueOnce(new Error('fetch failed')).mockResolvedValueOnce(reply('ok'));
    const provider = await createProvider({ GEMINI_API_KEY: 'test-key' });

    const response = await provider.generateContent({ prompt: 'Question' });

    expect(response.content).toBe('ok');
    expect(mockGenerateContent).toHaveBeenCalledTimes(2);
  });

  it('should not retry other failures', async () => {
    mockGenerateContent.mockRejectedValue(new Error('quota exceeded'));
    const provider = await createProvider({ GEMINI_API_KEY: 'test-key' });

    await expect(provider.generateContent({ prompt: 'Question' })).rejects.toThrow(
      'Gemini API error: quota exceeded',
    );
    expect(mockGenerateContent).toHaveBeenCalledTimes(1);
  });
});
