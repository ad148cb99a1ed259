/**
 * AI Execution Contracts
 *
 * These interfaces define the boundary between callers (route layer,
 * derived operations) and the provider routing layer.
 */

/**
 * Canonical provider names, in the order backends are probed at startup.
 * Ollama is always probed last and acts as the local last resort.
 */
export const PROVIDER_PROBE_ORDER = [
  'openai',
  'claude',
  'gemini',
  'groq',
  'ollama',
] as const;

export type ProviderName = (typeof PROVIDER_PROBE_ORDER)[number];

/**
 * Sentinel default meaning "first registered provider".
 */
export const AUTO_PROVIDER = 'auto';

/**
 * GenerationRequest
 * Input contract for a single generation call. Created per call, never mutated.
 */
export interface GenerationRequest {
  readonly prompt: string;
  /** Explicit provider override; falls back to the configured default */
  readonly provider?: string;
  /** Passed through to the backend unvalidated (conventionally 0.0-2.0) */
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly systemPrompt?: string;
}

/**
 * GenerationResult
 * Output contract. `provider` is the backend that actually served the
 * request, which differs from the requested one after a fallback.
 */
export interface GenerationResult {
  readonly response: string;
  readonly provider: string;
  readonly model: string;
}

/**
 * Streaming handle returned by AIExecutionService.stream().
 */
export interface GenerationStream {
  readonly provider: string;
  readonly model: string;
  readonly chunks: AsyncIterable<string>;
}

/**
 * Per-backend settings resolved from configuration.
 */
export interface ProviderSettings {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  timeoutMs: number;
  organization?: string;
}

/**
 * AIProvidersConfig
 * Backends whose credentials are absent are simply not present in `providers`.
 */
export interface AIProvidersConfig {
  defaultProvider: string;
  providers: Partial<Record<ProviderName, ProviderSettings>>;
}

/**
 * Defaults applied by adapters when a request leaves a field unset.
 */
export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful AI assistant.';
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1000;

export interface ProviderInfo {
  available_providers: string[];
  default_provider: string;
  total_providers: number;
}

export interface ProviderHealth extends ProviderInfo {
  status: 'healthy' | 'no_providers';
  default_provider_status: 'healthy' | 'degraded';
}
