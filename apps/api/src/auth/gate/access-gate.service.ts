import { Inject, Injectable } from '@nestjs/common';
import { AUTH_CONFIG, type AuthConfig } from '../../config/auth.config';
import type { UserIdentity } from '../../users/dto/user-identity.dto';
import { authError, AuthErrorKind, type AuthError } from '../errors/auth-error';
import type { SessionContext } from '../session-context';
import { SessionManager } from '../session-manager.service';
import { classifyRoute, normalizePath, RouteAccess } from './route-policy';

export interface GateRequest {
  path: string;
  accessToken: string | null;
}

export type GateDecision =
  | { outcome: 'allowed'; access: RouteAccess; identity: UserIdentity | null }
  | { outcome: 'already-authenticated' }
  | { outcome: 'denied'; access: RouteAccess; error: AuthError };

/**
 * AccessGate — decides whether one request may proceed.
 *
 * 1. The login route with a resolvable token sends the user home.
 * 2. Public paths pass without resolution.
 * 3. Anything else needs a token that resolves to a live identity.
 * 4. Admin paths additionally need a superuser.
 */
@Injectable()
export class AccessGate {
  constructor(
    private readonly sessionManager: SessionManager,
    @Inject(AUTH_CONFIG) private readonly config: AuthConfig,
  ) {}

  async evaluate(request: GateRequest, ctx: SessionContext): Promise<GateDecision> {
    const path = normalizePath(request.path);
    const { accessToken } = request;

    if (path === normalizePath(this.config.routes.login) && accessToken) {
      const current = await this.sessionManager.resolveIdentity(ctx, accessToken);
      if (current.isOk()) {
        return { outcome: 'already-authenticated' };
      }
    }

    const access = classifyRoute(path, this.config.routes);
    if (access === RouteAccess.PUBLIC) {
      return { outcome: 'allowed', access, identity: null };
    }

    if (!accessToken) {
      return {
        outcome: 'denied',
        access,
        error: authError(AuthErrorKind.TOKEN_MISSING, 'No access token presented'),
      };
    }

    const resolved = await this.sessionManager.resolveIdentity(ctx, accessToken);
    if (resolved.isErr()) {
      return { outcome: 'denied', access, error: resolved.error };
    }

    const identity = resolved.value;
    if (access === RouteAccess.ADMIN && !identity.isSuperuser) {
      return {
        outcome: 'denied',
        access,
        error: authError(
          AuthErrorKind.FORBIDDEN,
          `User ${identity.id} is not a superuser`,
        ),
      };
    }

    return { outcome: 'allowed', access, identity };
  }
}
