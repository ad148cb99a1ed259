/**
 * Dependency Injection Tokens
 */

/**
 * PROVIDER_REGISTRY
 *
 * Injection token for the startup-built ProviderRegistry.
 *
 * Usage:
 * @Inject(PROVIDER_REGISTRY) private readonly registry: ProviderRegistry
 */
export const PROVIDER_REGISTRY = 'PROVIDER_REGISTRY';

/**
 * AI_PROVIDERS_CONFIG
 *
 * Injection token for the typed AIProvidersConfig. Overridable in tests.
 */
export const AI_PROVIDERS_CONFIG = 'AI_PROVIDERS_CONFIG';
