import { Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { AIAdapter } from './adapters/ai-adapter.interface';
import { OpenAIAdapter } from './adapters/openai-ai.adapter';
import { AnthropicAdapter } from './adapters/anthropic-ai.adapter';
import { GeminiAdapter } from './adapters/gemini-ai.adapter';
import { GroqAdapter } from './adapters/groq-ai.adapter';
import { OllamaAdapter } from './adapters/ollama-ai.adapter';
import {
  AIProvidersConfig,
  PROVIDER_PROBE_ORDER,
  ProviderName,
  ProviderSettings,
} from './types';

/**
 * ProviderRegistry
 *
 * Immutable, startup-built collection of the adapters this process could
 * initialize, keyed by name, in registration order. Safe to share between
 * concurrent calls: nothing mutates it after construction.
 */
export class ProviderRegistry {
  private readonly adapters: ReadonlyMap<string, AIAdapter>;
  private readonly order: readonly string[];

  /**
   * @param adapters - In registration order; names must be unique
   * @param defaultProvider - May name a provider that is not registered
   */
  constructor(adapters: readonly AIAdapter[], readonly defaultProvider: string) {
    const map = new Map<string, AIAdapter>();
    for (const adapter of adapters) {
      if (map.has(adapter.name)) {
        throw new Error(`Provider "${adapter.name}" registered twice`);
      }
      map.set(adapter.name, adapter);
    }
    this.adapters = map;
    this.order = Object.freeze([...map.keys()]);
  }

  get(name: string): AIAdapter | undefined {
    return this.adapters.get(name);
  }

  has(name: string): boolean {
    return this.adapters.has(name);
  }

  /** Registered names in registration order */
  names(): readonly string[] {
    return this.order;
  }

  get size(): number {
    return this.order.length;
  }

  isEmpty(): boolean {
    return this.order.length === 0;
  }
}

function createAdapter(
  name: ProviderName,
  settings: ProviderSettings,
  httpService: HttpService,
): AIAdapter {
  switch (name) {
    case 'openai':
      return new OpenAIAdapter(settings.apiKey ?? '', {
        model: settings.model,
        timeout: settings.timeoutMs,
        baseURL: settings.baseUrl,
        organization: settings.organization,
      });

    case 'claude':
      return new AnthropicAdapter(settings.apiKey ?? '', {
        model: settings.model,
        timeout: settings.timeoutMs,
        baseURL: settings.baseUrl,
      });

    case 'gemini':
      return new GeminiAdapter(settings.apiKey ?? '', {
        model: settings.model,
        timeout: settings.timeoutMs,
      });

    case 'groq':
      return new GroqAdapter(settings.apiKey ?? '', {
        model: settings.model,
        timeout: settings.timeoutMs,
        baseURL: settings.baseUrl,
      });

    case 'ollama':
      return new OllamaAdapter(httpService, {
        baseUrl: settings.baseUrl,
        model: settings.model,
        timeout: settings.timeoutMs,
      });
  }
}

/**
 * Build the registry from configuration, probing backends in a fixed order.
 *
 * An adapter whose construction throws is logged and skipped so that
 * partial availability never blocks startup.
 */
export function buildProviderRegistry(
  config: AIProvidersConfig,
  httpService: HttpService,
  logger: Logger = new Logger(ProviderRegistry.name),
): ProviderRegistry {
  const adapters: AIAdapter[] = [];

  for (const name of PROVIDER_PROBE_ORDER) {
    const settings = config.providers[name];
    if (!settings) {
      continue;
    }

    try {
      adapters.push(createAdapter(name, settings, httpService));
      logger.log(`Provider "${name}" registered (model=${settings.model})`);
    } catch (error) {
      logger.warn(
        `Provider "${name}" skipped: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  const registry = new ProviderRegistry(adapters, config.defaultProvider);

  if (registry.isEmpty()) {
    logger.warn('No AI providers registered; generation calls will fail');
  } else {
    logger.log(
      `Providers available: ${registry.names().join(', ')} (default=${registry.defaultProvider})`,
    );
  }

  return registry;
}
