import { Logger } from '@nestjs/common';
import OpenAI from 'openai';
import { AIAdapter } from './ai-adapter.interface';
import { toGenerationFailure } from './failure-classifier';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_TEMPERATURE,
  GenerationRequest,
} from '../types';
import { GenerationFailure } from '../../errors/generation-failure';

export interface OpenAIAdapterOptions {
  model?: string;
  timeout?: number;
  baseURL?: string;
  organization?: string;
}

/**
 * OpenAIAdapter
 *
 * Integrates with the OpenAI Chat Completions API. Also serves as the base
 * for OpenAI-compatible backends (see GroqAdapter), which differ only in
 * endpoint, default model and registered name.
 *
 * Responsibilities:
 * - Transform GenerationRequest to Chat Completions format
 * - Return choices[0].message.content verbatim
 * - Stream delta content for streamGenerate()
 * - Normalize every failure into a GenerationFailure
 *
 * SDK retries are disabled; retries happen in the router as provider fallback.
 */
export class OpenAIAdapter implements AIAdapter {
  protected readonly logger: Logger;
  private readonly client: OpenAI;

  readonly name: string;
  readonly model: string;

  /**
   * @param name - Registered provider name (OpenAI-compatible subclasses override it)
   * @param defaultModel - Model used when options.model is absent
   */
  constructor(
    apiKey: string,
    options?: OpenAIAdapterOptions,
    name = 'openai',
    defaultModel = 'gpt-4-turbo',
  ) {
    if (!apiKey || apiKey.trim().length === 0) {
      throw new Error(`${name} API key is required`);
    }

    this.name = name;
    this.logger = new Logger(`${OpenAIAdapter.name}:${name}`);
    this.model = options?.model ?? defaultModel;

    this.client = new OpenAI({
      apiKey,
      timeout: options?.timeout,
      baseURL: options?.baseURL,
      organization: options?.organization,
      maxRetries: 0,
    });

    this.logger.log(`Adapter initialized with model: ${this.model}`);
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.logger.debug(
      `Generating (model=${this.model}, prompt=${request.prompt.length} chars)`,
    );

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        ...this.buildParams(request),
        stream: false,
      });
    } catch (error) {
      throw this.fail(error);
    }

    return this.extractContent(response);
  }

  async *streamGenerate(request: GenerationRequest): AsyncIterable<string> {
    this.logger.debug(`Streaming (model=${this.model})`);

    try {
      const stream = await this.client.chat.completions.create({
        ...this.buildParams(request),
        stream: true,
      });

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    } catch (error) {
      throw this.fail(error);
    }
  }

  private buildParams(
    request: GenerationRequest,
  ): Omit<OpenAI.Chat.ChatCompletionCreateParamsNonStreaming, 'stream'> {
    return {
      model: this.model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: request.temperature ?? DEFAULT_TEMPERATURE,
      messages: [
        {
          role: 'system',
          content: request.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
        },
        {
          role: 'user',
          content: request.prompt,
        },
      ],
    };
  }

  private extractContent(response: OpenAI.Chat.ChatCompletion): string {
    if (!response.choices || response.choices.length === 0) {
      this.logger.error('Response missing choices field');
      throw new GenerationFailure(
        this.name,
        'invalid_response',
        'missing choices',
      );
    }

    const content = response.choices[0].message?.content;
    if (typeof content !== 'string') {
      this.logger.error('Response missing content');
      throw new GenerationFailure(
        this.name,
        'invalid_response',
        'missing content',
      );
    }

    return content;
  }

  private fail(error: unknown): GenerationFailure {
    const failure = toGenerationFailure(this.name, error);
    this.logger.error(`API error: ${failure.message}`);
    return failure;
  }
}
