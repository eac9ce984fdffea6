import type { RouteSettings } from '../../config/auth.config';

/** What a path requires before the request may proceed */
export enum RouteAccess {
  PUBLIC = 'public',
  USER = 'user',
  ADMIN = 'admin',
}

/**
 * Canonical form of a path for classification. The router matches paths
 * case-insensitively, so `/ADMIN/sessions` and `/admin/sessions//` must land
 * in the same class as `/admin/sessions`.
 */
export function normalizePath(path: string): string {
  const trimmed = path.toLowerCase().replace(/\/{2,}/g, '/').replace(/\/+$/, '');
  return trimmed === '' ? '/' : trimmed;
}

function isUnder(path: string, prefix: string): boolean {
  const normalizedPrefix = normalizePath(prefix);
  if (prefix.endsWith('/')) {
    return normalizedPrefix === '/' || path.startsWith(`${normalizedPrefix}/`);
  }
  return path === normalizedPrefix || path.startsWith(`${normalizedPrefix}/`);
}

/**
 * Classify a request path.
 *
 * Public routes match exactly; public and admin prefixes match whole path
 * segments, so `/administrator` is not under `/admin`. Both sides are
 * normalized before comparing.
 */
export function classifyRoute(path: string, routes: RouteSettings): RouteAccess {
  const normalized = normalizePath(path);

  const isPublicRoute = [...routes.publicRoutes].some(
    (route) => normalizePath(route) === normalized,
  );
  if (
    isPublicRoute ||
    routes.publicPrefixes.some((prefix) => isUnder(normalized, prefix))
  ) {
    return RouteAccess.PUBLIC;
  }

  if (isUnder(normalized, routes.adminPrefix)) {
    return RouteAccess.ADMIN;
  }

  return RouteAccess.USER;
}
