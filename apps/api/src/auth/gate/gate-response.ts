import type { RouteSettings } from '../../config/auth.config';
import { AuthErrorKind, type AuthError } from '../errors/auth-error';

export interface ErrorBody {
  statusCode: number;
  error: string;
  message: string;
}

export type GateResponse =
  | { kind: 'redirect'; location: string; clearCookies: boolean }
  | { kind: 'json'; status: number; body: ErrorBody };

/** Denials that send the client back to the login page with cookies cleared */
const LOGIN_REDIRECT_KINDS: ReadonlySet<AuthErrorKind> = new Set([
  AuthErrorKind.TOKEN_MISSING,
  AuthErrorKind.MALFORMED,
  AuthErrorKind.INVALID_SIGNATURE,
  AuthErrorKind.INVALID_TOKEN_TYPE,
  AuthErrorKind.SESSION_NOT_FOUND,
  AuthErrorKind.USER_NOT_FOUND,
  AuthErrorKind.USER_INACTIVE,
  AuthErrorKind.NOT_AUTHENTICATED,
]);

/** `<refresh route>?redirect_url=<url>` */
export function refreshRedirect(routes: RouteSettings, originalUrl: string): string {
  return `${routes.refresh}?redirect_url=${encodeURIComponent(originalUrl)}`;
}

/**
 * Map a gate denial to its response. Depends only on the denial kind, the
 * URL being requested and the configured routes.
 */
export function denialResponse(
  error: AuthError,
  originalUrl: string,
  routes: RouteSettings,
): GateResponse {
  if (error.kind === AuthErrorKind.EXPIRED_SIGNATURE) {
    return {
      kind: 'redirect',
      location: refreshRedirect(routes, originalUrl),
      clearCookies: false,
    };
  }

  if (LOGIN_REDIRECT_KINDS.has(error.kind)) {
    return { kind: 'redirect', location: routes.login, clearCookies: true };
  }

  if (error.kind === AuthErrorKind.FORBIDDEN) {
    return {
      kind: 'json',
      status: 403,
      body: {
        statusCode: 403,
        error: 'Forbidden',
        message: 'Administrator privileges required',
      },
    };
  }

  return {
    kind: 'json',
    status: 500,
    body: {
      statusCode: 500,
      error: 'Internal Server Error',
      message: 'Internal server error',
    },
  };
}
