import { InternalServerErrorException } from '@nestjs/common';

/**
 * HTTP 500 when PostgreSQL or Redis fails mid-request. The cause is logged
 * where it happened; the client gets no detail.
 */
export class StoreUnavailableException extends InternalServerErrorException {
  constructor() {
    super({
      statusCode: 500,
      error: 'Internal Server Error',
      message: 'Internal server error',
    });
  }
}
