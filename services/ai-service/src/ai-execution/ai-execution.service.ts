import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import {
  AUTO_PROVIDER,
  GenerationRequest,
  GenerationResult,
  GenerationStream,
  ProviderHealth,
  ProviderInfo,
} from './types';
import { AIAdapter, supportsStreaming } from './adapters/ai-adapter.interface';
import { toGenerationFailure } from './adapters/failure-classifier';
import { PROVIDER_REGISTRY } from './adapters/tokens';
import { ProviderRegistry } from './provider-registry';
import { GenerationFailure } from '../errors/generation-failure';
import { NoProvidersAvailableException } from '../errors/no-providers-available.exception';
import { AllProvidersFailedException } from '../errors/all-providers-failed.exception';
import { StreamingUnavailableException } from '../errors/streaming-unavailable.exception';

export const HEALTH_PROBE_PROMPT = "Say 'OK' if you can read this.";

/**
 * AIExecutionService
 *
 * Routes a GenerationRequest to the best available adapter.
 *
 * Routing:
 * 1. Requested provider = request override, else the configured default
 * 2. Unregistered (or "auto") → first registered provider, with a warning
 * 3. Empty registry → NoProvidersAvailableException, no adapter touched
 * 4. On failure, try every other registered provider once, in registration
 *    order, strictly one after another
 * 5. Every provider failed → AllProvidersFailedException with one failure
 *    per provider, in attempt order
 */
@Injectable()
export class AIExecutionService {
  private readonly logger = new Logger(AIExecutionService.name);

  constructor(
    @Inject(PROVIDER_REGISTRY) private readonly registry: ProviderRegistry,
  ) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const ordered = this.attemptOrder(request);
    const attempts: GenerationFailure[] = [];

    for (const adapter of ordered) {
      try {
        const response = await adapter.generate(request);
        this.logger.log(`Generation succeeded with ${adapter.name}`);
        return { response, provider: adapter.name, model: adapter.model };
      } catch (error) {
        const failure = toGenerationFailure(adapter.name, error);
        attempts.push(failure);
        this.logger.error(`Generation failed with ${adapter.name}: ${failure.message}`);
      }
    }

    throw new AllProvidersFailedException(attempts);
  }

  /**
   * Stream from the first streaming-capable adapter in attempt order.
   * There is no fallback once chunks start flowing.
   */
  stream(request: GenerationRequest): GenerationStream {
    const ordered = this.attemptOrder(request);
    const adapter = ordered.find(supportsStreaming);

    if (!adapter) {
      throw new StreamingUnavailableException(this.registry.names());
    }

    if (adapter !== ordered[0]) {
      this.logger.warn(
        `Provider '${ordered[0].name}' cannot stream, using '${adapter.name}'`,
      );
    }

    return {
      provider: adapter.name,
      model: adapter.model,
      chunks: adapter.streamGenerate(request),
    };
  }

  getAvailableProviders(): readonly string[] {
    return this.registry.names();
  }

  get defaultProvider(): string {
    return this.registry.defaultProvider;
  }

  getProviderInfo(): ProviderInfo {
    return {
      available_providers: [...this.registry.names()],
      default_provider: this.registry.defaultProvider,
      total_providers: this.registry.size,
    };
  }

  /**
   * Probe generation end to end with a tiny prompt. Never throws: a failed
   * probe is reported as a degraded default provider.
   */
  async checkHealth(): Promise<ProviderHealth> {
    let defaultProviderStatus: ProviderHealth['default_provider_status'] = 'healthy';
    try {
      await this.generate({ prompt: HEALTH_PROBE_PROMPT, maxTokens: 10 });
    } catch (error) {
      defaultProviderStatus = 'degraded';
      this.logger.warn(
        `Health probe failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    return {
      status: this.registry.isEmpty() ? 'no_providers' : 'healthy',
      ...this.getProviderInfo(),
      default_provider_status: defaultProviderStatus,
    };
  }

  /**
   * Chosen provider first, then the rest in registration order, each once.
   */
  private attemptOrder(request: GenerationRequest): AIAdapter[] {
    if (!request.prompt || request.prompt.trim().length === 0) {
      throw new BadRequestException('Prompt must not be empty');
    }

    if (this.registry.isEmpty()) {
      throw new NoProvidersAvailableException();
    }

    const names = this.registry.names();
    const requested = request.provider ?? this.registry.defaultProvider;
    let chosen = requested;

    if (!this.registry.has(requested)) {
      chosen = names[0];
      if (requested !== AUTO_PROVIDER) {
        this.logger.warn(`Provider '${requested}' not available, using '${chosen}'`);
      }
    }

    this.logger.debug(`Routing generation to ${chosen} (requested=${requested})`);

    return [chosen, ...names.filter((name) => name !== chosen)].flatMap((name) => {
      const adapter = this.registry.get(name);
      return adapter ? [adapter] : [];
    });
  }
}
