import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when login credentials are invalid (unknown user, inactive
 * account or wrong password).
 *
 * HTTP 401 Unauthorized — one message for every case so usernames cannot
 * be enumerated.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Invalid username or password',
    });
  }
}
