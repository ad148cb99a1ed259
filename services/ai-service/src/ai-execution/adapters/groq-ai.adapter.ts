import { OpenAIAdapter } from './openai-ai.adapter';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

export interface GroqAdapterOptions {
  model?: string;
  timeout?: number;
  baseURL?: string;
}

/**
 * GroqAdapter
 *
 * Groq exposes an OpenAI-compatible Chat Completions endpoint, so the
 * OpenAI SDK is reused with Groq's base URL.
 */
export class GroqAdapter extends OpenAIAdapter {
  constructor(apiKey: string, options?: GroqAdapterOptions) {
    super(
      apiKey,
      {
        model: options?.model,
        timeout: options?.timeout,
        baseURL: options?.baseURL ?? GROQ_BASE_URL,
      },
      'groq',
      'llama-3.1-70b-versatile',
    );
  }
}
