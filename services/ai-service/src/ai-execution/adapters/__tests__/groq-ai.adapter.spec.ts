import OpenAI from 'openai';
import { GroqAdapter, GROQ_BASE_URL } from '../groq-ai.adapter';
import { supportsStreaming } from '../ai-adapter.interface';

jest.mock('openai', () => ({ __esModule: true, default: jest.fn() }));

describe('GroqAdapter', () => {
  let mockCreate: jest.Mock;

  beforeEach(() => {
    jest.clearAllMocks();
    mockCreate = jest.fn();
    (OpenAI as unknown as jest.Mock).mockImplementation(() => ({
      chat: { completions: { create: mockCreate } },
    }));
  });

  it('should point the OpenAI client at the Groq endpoint', () => {
    new GroqAdapter('test-groq-key', { timeout: 20000 });

    expect(OpenAI).toHaveBeenCalledWith({
      apiKey: 'test-groq-key',
      timeout: 20000,
      baseURL: GROQ_BASE_URL,
      organization: undefined,
      maxRetries: 0,
    });
  });

  it('should register as "groq" with its own default model', () => {
    const adapter = new GroqAdapter('test-groq-key');

    expect(adapter.name).toBe('groq');
    expect(adapter.model).toBe('llama-3.1-70b-versatile');
    expect(supportsStreaming(adapter)).toBe(true);
  });

  it('should tag failures with the groq provider name', async () => {
    mockCreate.mockRejectedValue({ status: 503, message: 'over capacity' });
    const adapter = new GroqAdapter('test-groq-key');

    await expect(adapter.generate({ prompt: 'hi' })).rejects.toMatchObject({
      provider: 'groq',
      failureCause: 'transport_error',
    });
  });

  it('should require an API key', () => {
    expect(() => new GroqAdapter('')).toThrow('groq API key is required');
  });
});
