import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { AIAdapter } from './ai-adapter.interface';
import { toGenerationFailure } from './failure-classifier';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_TEMPERATURE,
  GenerationRequest,
} from '../types';
import { GenerationFailure } from '../../errors/generation-failure';

export interface OllamaAdapterOptions {
  baseUrl?: string;
  model?: string;
  timeout?: number;
}

interface OllamaGenerateResponse {
  response?: unknown;
}

/**
 * OllamaAdapter
 *
 * Locally hosted models through Ollama's /api/generate endpoint.
 * Needs no credentials, so it is always registered (last) unless disabled.
 * Local inference is slow, hence the longer default timeout.
 */
export class OllamaAdapter implements AIAdapter {
  private readonly logger = new Logger(OllamaAdapter.name);
  private readonly baseUrl: string;
  private readonly timeout: number;

  readonly name = 'ollama';
  readonly model: string;

  constructor(
    private readonly httpService: HttpService,
    options?: OllamaAdapterOptions,
  ) {
    this.baseUrl = (options?.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, '');
    this.model = options?.model ?? 'llama3:8b';
    this.timeout = options?.timeout ?? 120000;

    this.logger.log(`OllamaAdapter initialized (${this.baseUrl}, model: ${this.model})`);
  }

  async generate(request: GenerationRequest): Promise<string> {
    let text: unknown;
    try {
      const response = await firstValueFrom(
        this.httpService.post<OllamaGenerateResponse>(
          `${this.baseUrl}/api/generate`,
          {
            model: this.model,
            prompt: request.prompt,
            system: request.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
            stream: false,
            options: {
              temperature: request.temperature ?? DEFAULT_TEMPERATURE,
              num_predict: request.maxTokens ?? DEFAULT_MAX_TOKENS,
            },
          },
          { timeout: this.timeout },
        ),
      );
      text = response.data?.response;
    } catch (error) {
      const failure = toGenerationFailure(this.name, error);
      this.logger.error(`Ollama request failed: ${failure.message}`);
      throw failure;
    }

    if (typeof text !== 'string') {
      this.logger.error('Ollama response missing "response" field');
      throw new GenerationFailure(this.name, 'invalid_response', 'missing response field');
    }

    return text;
  }
}
