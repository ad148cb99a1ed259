import { GenerationRequest } from '../types';

/**
 * AIAdapter
 *
 * Capability interface for one AI backend.
 *
 * Design:
 * - Provider-agnostic contract
 * - No SDK types at interface level
 * - Adapters translate wire formats only; they never retry or fall back
 */
export interface AIAdapter {
  /**
   * Canonical provider name the adapter is registered under
   * Examples: 'openai', 'claude', 'ollama'
   */
  readonly name: string;

  /**
   * Model identifier sent to the backend
   */
  readonly model: string;

  /**
   * Generate text for a request
   *
   * @returns Raw generated text, unparsed
   * @throws GenerationFailure on any backend failure
   */
  generate(request: GenerationRequest): Promise<string>;

  /**
   * Stream generated text as it is produced. Only some backends implement it.
   * The returned iterable is finite and cannot be restarted.
   */
  streamGenerate?(request: GenerationRequest): AsyncIterable<string>;
}

/**
 * Narrow an adapter to one that supports streaming.
 */
export function supportsStreaming(
  adapter: AIAdapter,
): adapter is AIAdapter & Required<Pick<AIAdapter, 'streamGenerate'>> {
  return typeof adapter.streamGenerate === 'function';
}
