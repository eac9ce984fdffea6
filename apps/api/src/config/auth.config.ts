import { ConfigService } from '@nestjs/config';
import type { JwtAlgorithm } from './env.validation';

/** Injection token for the AuthConfig object */
export const AUTH_CONFIG = 'AUTH_CONFIG';

export interface TokenSettings {
  secret: string;
  algorithm: JwtAlgorithm;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
}

export interface RouteSettings {
  login: string;
  refresh: string;
  home: string;
  adminPrefix: string;
  /** Exact paths reachable without a session */
  publicRoutes: ReadonlySet<string>;
  /** Path prefixes reachable without a session (static assets, docs) */
  publicPrefixes: readonly string[];
}

export interface CookieSettings {
  accessName: string;
  refreshName: string;
  secure: boolean;
}

/**
 * Everything the session lifecycle needs to know, built once at start-up and
 * handed to the codec, session manager, gate and controllers.
 */
export interface AuthConfig {
  tokens: TokenSettings;
  routes: RouteSettings;
  cookies: CookieSettings;
  passwordSaltRounds: number;
}

export const ACCESS_TOKEN_COOKIE = 'access_token';
export const REFRESH_TOKEN_COOKIE = 'refresh_token';

const SECONDS_PER_MINUTE = 60;

/**
 * Builds the AuthConfig from validated environment variables.
 *
 * Register, login, refresh and health are always public; the login and home
 * routes configured for the front end are added on top.
 */
export function buildAuthConfig(configService: ConfigService): AuthConfig {
  const login = configService.get<string>('LOGIN_ROUTE', '/login');
  const refresh = configService.get<string>('REFRESH_ROUTE', '/auth/refresh');
  const home = configService.get<string>('HOME_ROUTE', '/');

  const secret = configService.get<string>('JWT_SECRET');
  if (!secret) {
    throw new Error('JWT_SECRET is not defined. Check your .env file.');
  }

  return {
    tokens: {
      secret,
      algorithm: configService.get<JwtAlgorithm>('JWT_ALGORITHM', 'HS256'),
      accessTtlSeconds:
        configService.get<number>('ACCESS_TOKEN_EXPIRE_MINUTES', 15) *
        SECONDS_PER_MINUTE,
      refreshTtlSeconds:
        configService.get<number>('REFRESH_TOKEN_EXPIRE_MINUTES', 60 * 24 * 7) *
        SECONDS_PER_MINUTE,
    },
    routes: {
      login,
      refresh,
      home,
      adminPrefix: configService.get<string>('ADMIN_ROUTE_PREFIX', '/admin'),
      publicRoutes: new Set([
        login,
        refresh,
        '/auth/login',
        '/auth/register',
        '/auth/refresh',
        '/health',
      ]),
      publicPrefixes: ['/static/', '/docs'],
    },
    cookies: {
      accessName: ACCESS_TOKEN_COOKIE,
      refreshName: REFRESH_TOKEN_COOKIE,
      secure: configService.get<boolean>('COOKIE_SECURE', true),
    },
    passwordSaltRounds: configService.get<number>('BCRYPT_SALT_ROUNDS', 12),
  };
}
