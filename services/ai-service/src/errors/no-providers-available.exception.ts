import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * NoProvidersAvailableException
 * The provider registry was empty when the call was made.
 *
 * HTTP 503 Service Unavailable
 */
export class NoProvidersAvailableException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        error: 'No Providers Available',
        message: 'No AI providers are configured for this process',
      },
      HttpStatus.SERVICE_UNAVAILABLE,
    );
  }
}
