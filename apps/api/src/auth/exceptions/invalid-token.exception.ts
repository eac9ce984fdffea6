import { UnauthorizedException } from '@nestjs/common';

/** HTTP 401 for a token that is missing, forged, of the wrong type or revoked */
export class InvalidTokenException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Invalid or revoked token',
    });
  }
}

/** HTTP 401 for a correctly signed token past its expiry */
export class TokenExpiredException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Token has expired',
    });
  }
}
