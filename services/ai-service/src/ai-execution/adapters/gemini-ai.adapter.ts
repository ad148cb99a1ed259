import { Logger } from '@nestjs/common';
import { GoogleGenAI } from '@google/genai';
import { AIAdapter } from './ai-adapter.interface';
import { toGenerationFailure } from './failure-classifier';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_TEMPERATURE,
  GenerationRequest,
} from '../types';
import { GenerationFailure } from '../../errors/generation-failure';

export interface GeminiAdapterOptions {
  model?: string;
  timeout?: number;
}

/**
 * GeminiAdapter
 *
 * Transport to Google Gemini (generativelanguage.googleapis.com) through the
 * @google/genai SDK. All Gemini request/response details stay in this file.
 */
export class GeminiAdapter implements AIAdapter {
  private readonly logger = new Logger(GeminiAdapter.name);
  private readonly client: GoogleGenAI;
  private readonly defaultModel = 'gemini-1.5-flash';

  readonly name = 'gemini';
  readonly model: string;

  constructor(apiKey: string, options?: GeminiAdapterOptions) {
    if (!apiKey || apiKey.trim().length === 0) {
      throw new Error('Gemini API key is required');
    }

    this.model = options?.model ?? this.defaultModel;
    this.client = new GoogleGenAI({
      apiKey,
      httpOptions: options?.timeout ? { timeout: options.timeout } : undefined,
    });

    this.logger.log(`GeminiAdapter initialized with model: ${this.model}`);
  }

  async generate(request: GenerationRequest): Promise<string> {
    let text: string | undefined;
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: request.prompt,
        config: {
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
          maxOutputTokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          systemInstruction: request.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
        },
      });
      text = response.text;
    } catch (error) {
      const failure = toGenerationFailure(this.name, error);
      this.logger.error(`Gemini API error: ${failure.message}`);
      throw failure;
    }

    if (text === undefined) {
      this.logger.error('Gemini response does not contain text content');
      throw new GenerationFailure(this.name, 'invalid_response', 'no text content');
    }

    return text;
  }
}
