// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';

// ── Session lifecycle ───────────────────────────────────────
export { SessionManager } from './session-manager.service';
export type { SessionListing } from './session-manager.service';
export { SessionContextFactory } from './session-context';
export type { SessionContext } from './session-context';

// ── Decorators (for use in other feature modules) ───────────
export { CurrentUser } from './decorators/current-user.decorator';

// ── Errors ──────────────────────────────────────────────────
export { AuthErrorKind } from './errors/auth-error';
export type { AuthError, AuthResult } from './errors/auth-error';
export { toHttpException, unwrapOrThrow } from './exceptions';

// ── Interfaces ──────────────────────────────────────────────
export type { AuthenticatedRequest } from './interfaces/authenticated-request.interface';
