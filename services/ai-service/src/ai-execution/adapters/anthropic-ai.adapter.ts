import { Logger } from '@nestjs/common';
import Anthropic from '@anthropic-ai/sdk';
import { AIAdapter } from './ai-adapter.interface';
import { toGenerationFailure } from './failure-classifier';
import {
  DEFAULT_SYSTEM_PROMPT,
  DEFAULT_TEMPERATURE,
  GenerationRequest,
} from '../types';
import { GenerationFailure } from '../../errors/generation-failure';

export interface AnthropicAdapterOptions {
  model?: string;
  timeout?: number;
  baseURL?: string;
}

/**
 * AnthropicAdapter
 *
 * Integrates with Anthropic's Messages API. Registered as "claude".
 *
 * Responsibilities:
 * - Transform GenerationRequest to Messages API format
 * - Concatenate text blocks of the response
 * - Normalize every failure into a GenerationFailure
 */
export class AnthropicAdapter implements AIAdapter {
  private readonly logger = new Logger(AnthropicAdapter.name);
  private readonly client: Anthropic;
  private readonly defaultModel = 'claude-3-5-sonnet-20240620';
  private readonly defaultMaxTokens = 1024;

  readonly name = 'claude';
  readonly model: string;

  constructor(apiKey: string, options?: AnthropicAdapterOptions) {
    if (!apiKey || apiKey.trim().length === 0) {
      throw new Error('Anthropic API key is required');
    }

    this.model = options?.model ?? this.defaultModel;

    this.client = new Anthropic({
      apiKey,
      timeout: options?.timeout,
      baseURL: options?.baseURL,
      maxRetries: 0,
    });

    this.logger.log(`AnthropicAdapter initialized with model: ${this.model}`);
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.logger.debug(
      `Generating (model=${this.model}, prompt=${request.prompt.length} chars)`,
    );

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: request.maxTokens ?? this.defaultMaxTokens,
        temperature: request.temperature ?? DEFAULT_TEMPERATURE,
        system: request.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
        messages: [
          {
            role: 'user',
            content: request.prompt,
          },
        ],
      });
    } catch (error) {
      const failure = toGenerationFailure(this.name, error);
      this.logger.error(`Anthropic API error: ${failure.message}`);
      throw failure;
    }

    return this.extractText(response);
  }

  /**
   * Multiple text blocks are joined with a blank line.
   */
  private extractText(response: Anthropic.Message): string {
    if (!response.content || response.content.length === 0) {
      this.logger.error('Anthropic response missing content field');
      throw new GenerationFailure(this.name, 'invalid_response', 'missing content');
    }

    const textBlocks = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text);

    if (textBlocks.length === 0) {
      this.logger.error('Anthropic response contains no text blocks');
      throw new GenerationFailure(this.name, 'invalid_response', 'no text content');
    }

    return textBlocks.join('\n\n');
  }
}
