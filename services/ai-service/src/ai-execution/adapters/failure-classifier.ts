import { GenerationFailure, GenerationFailureCause } from '../../errors/generation-failure';

/**
 * Map an HTTP status returned by a backend to a failure cause.
 */
export function causeForStatus(status: number): GenerationFailureCause {
  if (status === 401 || status === 403) {
    return 'auth_error';
  }
  if (status === 429) {
    return 'rate_limited';
  }
  if (status === 408 || status === 504) {
    return 'timeout';
  }
  return 'transport_error';
}

function readStatus(error: object): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  return undefined;
}

function isTimeoutError(error: Error): boolean {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  return (
    error.name === 'TimeoutError' ||
    error.name === 'APIConnectionTimeoutError' ||
    code === 'ETIMEDOUT' ||
    code === 'ECONNABORTED'
  );
}

function mentionsTimeout(message: string): boolean {
  return /timed? ?out/i.test(message) || message.includes('ETIMEDOUT');
}

/**
 * Normalize anything thrown by an SDK or HTTP client into a GenerationFailure.
 *
 * Error categories:
 * - SDK timeout errors, ETIMEDOUT/ECONNABORTED → timeout
 * - 401/403 → auth_error
 * - 429 → rate_limited
 * - 408/504 → timeout
 * - other statuses → transport_error
 * - no status: a message mentioning a timeout → timeout, else transport_error
 */
export function toGenerationFailure(
  provider: string,
  error: unknown,
): GenerationFailure {
  if (error instanceof GenerationFailure) {
    return error;
  }

  if (error instanceof Error && isTimeoutError(error)) {
    return new GenerationFailure(provider, 'timeout', error.message);
  }

  if (typeof error === 'object' && error !== null) {
    const status = readStatus(error);
    const message =
      'message' in error && typeof error.message === 'string'
        ? error.message
        : 'Unknown error';

    if (status !== undefined) {
      return new GenerationFailure(
        provider,
        causeForStatus(status),
        `HTTP ${status}: ${message}`,
      );
    }

    if (mentionsTimeout(message)) {
      return new GenerationFailure(provider, 'timeout', message);
    }

    return new GenerationFailure(provider, 'transport_error', message);
  }

  return new GenerationFailure(provider, 'transport_error', String(error));
}
