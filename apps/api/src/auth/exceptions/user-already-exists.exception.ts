import { ConflictException } from '@nestjs/common';

/**
 * Thrown when registering with a username or email that is already taken.
 *
 * HTTP 409 Conflict.
 */
export class UserAlreadyExistsException extends ConflictException {
  constructor(message: string) {
    super({
      statusCode: 409,
      error: 'Conflict',
      message,
    });
  }
}
