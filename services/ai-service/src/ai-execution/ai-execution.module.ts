import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpModule, HttpService } from '@nestjs/axios';
import { AIExecutionService } from './ai-execution.service';
import { AI_PROVIDERS_CONFIG, PROVIDER_REGISTRY } from './adapters/tokens';
import { buildProviderRegistry } from './provider-registry';
import { AIProvidersConfig } from './types';
import { loadAIProvidersConfig } from '../config/ai-providers.config';

/**
 * AIExecutionModule
 *
 * Providers:
 * - AI_PROVIDERS_CONFIG (typed configuration, read once from ConfigService)
 * - PROVIDER_REGISTRY (adapters built once at startup from that configuration)
 * - AIExecutionService (routing with fallback)
 */
@Module({
  imports: [HttpModule],
  providers: [
    {
      provide: AI_PROVIDERS_CONFIG,
      useFactory: (configService: ConfigService): AIProvidersConfig =>
        loadAIProvidersConfig((key) => configService.get<string>(key)),
      inject: [ConfigService],
    },
    {
      provide: PROVIDER_REGISTRY,
      useFactory: (config: AIProvidersConfig, httpService: HttpService) =>
        buildProviderRegistry(config, httpService),
      inject: [AI_PROVIDERS_CONFIG, HttpService],
    },
    AIExecutionService,
  ],
  exports: [AIExecutionService],
})
export class AIExecutionModule {}
