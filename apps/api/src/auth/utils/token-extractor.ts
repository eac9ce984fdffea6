import type { Request } from 'express';
import type { CookieSettings } from '../../config/auth.config';

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

/** A non-empty string cookie, as parsed by cookie-parser */
export function readCookie(req: Request, name: string): string | null {
  const cookies: Record<string, unknown> = req.cookies ?? {};
  const value = cookies[name];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function readBearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header) {
    return null;
  }
  const match = BEARER_PATTERN.exec(header.trim());
  return match ? match[1] : null;
}

/** Access token from its cookie, falling back to `Authorization: Bearer` */
export function extractAccessToken(
  req: Request,
  cookies: CookieSettings,
): string | null {
  return readCookie(req, cookies.accessName) ?? readBearerToken(req);
}

/** Refresh token from the request body, its cookie, or the bearer header */
export function extractRefreshToken(
  req: Request,
  cookies: CookieSettings,
  fromBody?: string,
): string | null {
  if (fromBody) {
    return fromBody;
  }
  return readCookie(req, cookies.refreshName) ?? readBearerToken(req);
}

/**
 * Path part of a request URL. Uses `originalUrl` so that mounting prefixes
 * applied by the router are not lost. Read as a raw path, never as a URL:
 * `//admin/sessions` would otherwise parse as host `admin`.
 */
export function requestPath(originalUrl: string): string {
  const end = originalUrl.search(/[?#]/);
  return end === -1 ? originalUrl : originalUrl.slice(0, end);
}

/** Only same-origin paths are followed after a refresh */
export function isSafeRedirect(target: unknown): target is string {
  return (
    typeof target === 'string' &&
    target.startsWith('/') &&
    !target.startsWith('//') &&
    !target.includes('\\')
  );
}
