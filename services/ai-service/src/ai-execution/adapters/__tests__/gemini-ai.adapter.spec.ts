import { GoogleGenAI } from '@google/genai';
import { GeminiAdapter } from '../gemini-ai.adapter';

jest.mock('@google/genai', () => ({ GoogleGenAI: jest.fn() }));

describe('GeminiAdapter', () => {
  let mockGenerateContent: jest.Mock;
  let adapter: GeminiAdapter;

  beforeEach(() => {
    jest.clearAllMocks();
    mockGenerateContent = jest.fn();
    (GoogleGenAI as unknown as jest.Mock).mockImplementation(() => ({
      models: { generateContent: mockGenerateContent },
    }));
    adapter = new GeminiAdapter('test-google-key', { timeout: 30000 });
  });

  it('should construct the SDK client with key and timeout', () => {
    expect(GoogleGenAI).toHaveBeenCalledWith({
      apiKey: 'test-google-key',
      httpOptions: { timeout: 30000 },
    });
    expect(adapter.name).toBe('gemini');
    expect(adapter.model).toBe('gemini-1.5-flash');
  });

  it('should throw error when API key is missing', () => {
    expect(() => new GeminiAdapter('')).toThrow('Gemini API key is required');
  });

  it('should map the request onto generateContent', async () => {
    mockGenerateContent.mockResolvedValue({ text: 'Gemini says hi' });

    const text = await adapter.generate({
      prompt: 'Say hi',
      temperature: 0.2,
      maxTokens: 64,
    });

    expect(text).toBe('Gemini says hi');
    expect(mockGenerateContent).toHaveBeenCalledWith({
      model: 'gemini-1.5-flash',
      contents: 'Say hi',
      config: {
        temperature: 0.2,
        maxOutputTokens: 64,
        systemInstruction: 'You are a helpful AI assistant.',
      },
    });
  });

  it('should reject a response without text as invalid_response', async () => {
    mockGenerateContent.mockResolvedValue({ text: undefined });

    await expect(adapter.generate({ prompt: 'Say hi' })).rejects.toMatchObject({
      provider: 'gemini',
      failureCause: 'invalid_response',
    });
  });

  it('should classify API errors by status', async () => {
    mockGenerateContent.mockRejectedValue(
      Object.assign(new Error('API key not valid'), { status: 403 }),
    );

    await expect(adapter.generate({ prompt: 'Say hi' })).rejects.toMatchObject({
      failureCause: 'auth_error',
    });
  });
});
