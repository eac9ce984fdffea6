import type { CookieOptions, Response } from 'express';
import type { AuthConfig, CookieSettings } from '../../config/auth.config';
import type { TokenPair } from '../token/token-claims.interface';

function baseOptions(cookies: CookieSettings): CookieOptions {
  return {
    httpOnly: true,
    secure: cookies.secure,
    sameSite: 'lax',
    path: '/',
  };
}

export function setAuthCookies(
  res: Response,
  pair: TokenPair,
  config: AuthConfig,
): void {
  const options = baseOptions(config.cookies);

  res.cookie(config.cookies.accessName, pair.accessToken, {
    ...options,
    maxAge: config.tokens.accessTtlSeconds * 1000,
  });
  res.cookie(config.cookies.refreshName, pair.refreshToken, {
    ...options,
    maxAge: config.tokens.refreshTtlSeconds * 1000,
  });
}

export function clearAuthCookies(res: Response, cookies: CookieSettings): void {
  const options = baseOptions(cookies);

  res.clearCookie(cookies.accessName, options);
  res.clearCookie(cookies.refreshName, options);
}
