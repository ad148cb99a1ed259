import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * StreamingUnavailableException
 * None of the registered providers supports streamed generation.
 *
 * HTTP 501 Not Implemented
 */
export class StreamingUnavailableException extends HttpException {
  constructor(registered: readonly string[]) {
    super(
      {
        statusCode: HttpStatus.NOT_IMPLEMENTED,
        error: 'Streaming Unavailable',
        message: `None of the registered providers supports streaming (${registered.join(', ') || 'none'})`,
      },
      HttpStatus.NOT_IMPLEMENTED,
    );
  }
}
