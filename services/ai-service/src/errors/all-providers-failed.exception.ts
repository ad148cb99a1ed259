import { HttpException, HttpStatus } from '@nestjs/common';
import { GenerationFailure } from './generation-failure';

/**
 * AllProvidersFailedException
 * Every registered provider was attempted and every attempt failed.
 * `attempts` is in attempt order, one entry per provider.
 *
 * HTTP 502 Bad Gateway
 */
export class AllProvidersFailedException extends HttpException {
  constructor(public readonly attempts: readonly GenerationFailure[]) {
    super(
      {
        statusCode: HttpStatus.BAD_GATEWAY,
        error: 'All Providers Failed',
        message: `All ${attempts.length} AI providers failed: ${attempts
          .map((attempt) => `${attempt.provider}=${attempt.failureCause}`)
          .join(', ')}`,
        details: {
          attempts: attempts.map((attempt) => ({
            provider: attempt.provider,
            cause: attempt.failureCause,
            message: attempt.message,
          })),
        },
      },
      HttpStatus.BAD_GATEWAY,
    );
  }
}
