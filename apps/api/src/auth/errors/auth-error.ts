import type { Result } from 'neverthrow';

/**
 * Every expected failure of the session lifecycle.
 *
 * Token kinds (MALFORMED, INVALID_SIGNATURE, EXPIRED_SIGNATURE,
 * INVALID_TOKEN_TYPE) come from the codec; SESSION_NOT_FOUND, USER_NOT_FOUND
 * and USER_INACTIVE from resolution; FORBIDDEN only from the access gate.
 */
export enum AuthErrorKind {
  MALFORMED = 'malformed',
  INVALID_SIGNATURE = 'invalid_signature',
  EXPIRED_SIGNATURE = 'expired_signature',
  INVALID_TOKEN_TYPE = 'invalid_token_type',
  TOKEN_MISSING = 'token_missing',
  SESSION_NOT_FOUND = 'session_not_found',
  USER_NOT_FOUND = 'user_not_found',
  USER_INACTIVE = 'user_inactive',
  NOT_AUTHENTICATED = 'not_authenticated',
  CONFLICT = 'conflict',
  FORBIDDEN = 'forbidden',
  STORE_UNAVAILABLE = 'store_unavailable',
}

export interface AuthError {
  kind: AuthErrorKind;
  /** Server-side description; never sent to clients as-is */
  message: string;
}

export type AuthResult<T> = Result<T, AuthError>;

export function authError(kind: AuthErrorKind, message: string): AuthError {
  return { kind, message };
}
