/**
 * Categories an adapter failure is normalized into.
 */
export type GenerationFailureCause =
  | 'transport_error'
  | 'auth_error'
  | 'rate_limited'
  | 'invalid_response'
  | 'timeout';

/**
 * GenerationFailure
 * Thrown by a single adapter. The router recovers from it by falling back
 * to the next registered provider; it never reaches callers on its own.
 */
export class GenerationFailure extends Error {
  constructor(
    public readonly provider: string,
    public readonly failureCause: GenerationFailureCause,
    message: string,
  ) {
    super(`${provider} generation failed (${failureCause}): ${message}`);
    this.name = 'GenerationFailure';
  }
}
