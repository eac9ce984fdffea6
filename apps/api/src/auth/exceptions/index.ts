import { ForbiddenException, HttpException } from '@nestjs/common';
import type { Result } from 'neverthrow';
import { AuthErrorKind, type AuthError } from '../errors/auth-error';
import { InvalidCredentialsException } from './invalid-credentials.exception';
import { InvalidTokenException, TokenExpiredException } from './invalid-token.exception';
import { StoreUnavailableException } from './store-unavailable.exception';
import { UserAlreadyExistsException } from './user-already-exists.exception';

export { InvalidCredentialsException } from './invalid-credentials.exception';
export { InvalidTokenException, TokenExpiredException } from './invalid-token.exception';
export { StoreUnavailableException } from './store-unavailable.exception';
export { UserAlreadyExistsException } from './user-already-exists.exception';

/** Translate an AuthError into the HTTP exception a controller throws */
export function toHttpException(error: AuthError): HttpException {
  switch (error.kind) {
    case AuthErrorKind.NOT_AUTHENTICATED:
      return new InvalidCredentialsException();
    case AuthErrorKind.CONFLICT:
      return new UserAlreadyExistsException(error.message);
    case AuthErrorKind.EXPIRED_SIGNATURE:
      return new TokenExpiredException();
    case AuthErrorKind.MALFORMED:
    case AuthErrorKind.INVALID_SIGNATURE:
    case AuthErrorKind.INVALID_TOKEN_TYPE:
    case AuthErrorKind.TOKEN_MISSING:
    case AuthErrorKind.SESSION_NOT_FOUND:
    case AuthErrorKind.USER_NOT_FOUND:
    case AuthErrorKind.USER_INACTIVE:
      return new InvalidTokenException();
    case AuthErrorKind.FORBIDDEN:
      return new ForbiddenException({
        statusCode: 403,
        error: 'Forbidden',
        message: 'Administrator privileges required',
      });
    case AuthErrorKind.STORE_UNAVAILABLE:
      return new StoreUnavailableException();
  }
}

/** Value of a successful result, or the matching HTTP exception */
export function unwrapOrThrow<T>(result: Result<T, AuthError>): T {
  if (result.isErr()) {
    throw toHttpException(result.error);
  }
  return result.value;
}
