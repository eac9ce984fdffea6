import { Injectable, Logger } from '@nestjs/common';
import { err, ok } from 'neverthrow';
import { UserIdentity } from '../users/dto/user-identity.dto';
import { PasswordHasher } from '../users/password-hasher.service';
import {
  authError,
  AuthErrorKind,
  type AuthError,
  type AuthResult,
} from './errors/auth-error';
import type { SessionContext } from './session-context';
import { TokenType, type TokenPair } from './token/token-claims.interface';
import { TokenCodec } from './token/token-codec.service';

/** One live session as shown to administrators */
export interface SessionListing {
  userId: string;
  username: string;
  email: string;
  isActive: boolean;
  isSuperuser: boolean;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * SessionManager — login, refresh, logout and identity resolution.
 *
 * Holds no state: users live in the CredentialStore, the one live session of
 * each user is a marker in the SessionStore, and both arrive per call in a
 * SessionContext. A token is honoured only while its subject's marker exists,
 * so deleting the marker revokes every outstanding token of that user.
 *
 * Expected failures come back as AuthResult values. Store exceptions are
 * logged here and surface as STORE_UNAVAILABLE; nothing raw is rethrown.
 */
@Injectable()
export class SessionManager {
  private readonly logger = new Logger(SessionManager.name);

  constructor(
    private readonly codec: TokenCodec,
    private readonly passwordHasher: PasswordHasher,
  ) {}

  /**
   * Authenticate with username and password, start a session and issue a
   * token pair. Any previous session of the user is replaced.
   */
  async login(
    ctx: SessionContext,
    username: string,
    password: string,
  ): Promise<AuthResult<TokenPair>> {
    // ── Find user by username ─────────────────────────────
    const found = await this.attempt('user lookup', () =>
      ctx.users.findByUsername(username),
    );
    if (found.isErr()) return err(found.error);

    const user = found.value;
    if (!user) {
      // Still hash to prevent timing-based user enumeration
      await this.passwordHasher.hash(password);
      this.logger.warn(`Login rejected: unknown username "${username}"`);
      return err(notAuthenticated());
    }

    if (!user.isActive) {
      this.logger.warn(`Login rejected: inactive user ${user.id}`);
      return err(notAuthenticated());
    }

    // ── Verify password ───────────────────────────────────
    const isPasswordValid = await this.passwordHasher.compare(
      password,
      user.passwordHash,
    );
    if (!isPasswordValid) {
      this.logger.warn(`Login rejected: wrong password for user ${user.id}`);
      return err(notAuthenticated());
    }

    // ── Record session ────────────────────────────────────
    const recorded = await this.attempt('session write', () =>
      ctx.sessions.set(user.id),
    );
    if (recorded.isErr()) return err(recorded.error);

    this.logger.log(`User logged in: ${user.id} (${user.username})`);
    return ok(this.codec.issuePair(user.id));
  }

  /**
   * Exchange a refresh token for a new pair while the session is live.
   *
   * Refresh tokens are not tracked individually; one may be replayed until it
   * expires or the session ends.
   */
  async refresh(
    ctx: SessionContext,
    refreshToken: string,
  ): Promise<AuthResult<TokenPair>> {
    const verified = this.codec.verify(refreshToken, TokenType.REFRESH);
    if (verified.isErr()) return err(verified.error);

    const userId = verified.value.sub;
    const live = await this.checkSession(ctx, userId);
    if (live.isErr()) return err(live.error);

    this.logger.debug(`Session refreshed for user ${userId}`);
    return ok(this.codec.issuePair(userId));
  }

  /** Resolve an access token to the identity of a live, active user */
  async resolveIdentity(
    ctx: SessionContext,
    accessToken: string,
  ): Promise<AuthResult<UserIdentity>> {
    const verified = this.codec.verify(accessToken, TokenType.ACCESS);
    if (verified.isErr()) return err(verified.error);

    const userId = verified.value.sub;
    const live = await this.checkSession(ctx, userId);
    if (live.isErr()) return err(live.error);

    const found = await this.attempt('user lookup', () =>
      ctx.users.findById(userId),
    );
    if (found.isErr()) return err(found.error);

    const user = found.value;
    if (!user) {
      return err(
        authError(AuthErrorKind.USER_NOT_FOUND, `User ${userId} no longer exists`),
      );
    }
    if (!user.isActive) {
      return err(
        authError(AuthErrorKind.USER_INACTIVE, `User ${userId} is deactivated`),
      );
    }

    return ok(UserIdentity.fromEntity(user));
  }

  /** End the user's session. Ending a session that does not exist is fine. */
  async logout(ctx: SessionContext, userId: string): Promise<AuthResult<void>> {
    const deleted = await this.attempt('session delete', () =>
      ctx.sessions.delete(userId),
    );
    if (deleted.isErr()) return err(deleted.error);

    if (deleted.value) {
      this.logger.log(`User logged out: ${userId}`);
    }
    return ok(undefined);
  }

  // ── Administration ────────────────────────────────────────

  /**
   * List live sessions with their owners.
   *
   * The listing is approximate: sessions may start or end while the scan is
   * paging. Markers whose user cannot be loaded are logged and left out.
   */
  async listSessions(ctx: SessionContext): Promise<AuthResult<SessionListing[]>> {
    const listings: SessionListing[] = [];
    // SCAN may return a key more than once
    const seen = new Set<string>();

    try {
      for await (const page of ctx.sessions.scan()) {
        const fresh = page.filter((userId) => !seen.has(userId));
        fresh.forEach((userId) => seen.add(userId));

        const described = await Promise.all(
          fresh.map((userId) => this.describeSession(ctx, userId)),
        );
        for (const listing of described) {
          if (listing) listings.push(listing);
        }
      }
    } catch (error) {
      return err(this.storeUnavailable('session scan', error));
    }

    return ok(listings);
  }

  /** Delete one user's session; the value says whether one existed */
  async terminateSession(
    ctx: SessionContext,
    userId: string,
  ): Promise<AuthResult<boolean>> {
    const deleted = await this.attempt('session delete', () =>
      ctx.sessions.delete(userId),
    );
    if (deleted.isOk() && deleted.value) {
      this.logger.log(`Session terminated by administrator: ${userId}`);
    }
    return deleted;
  }

  /**
   * Delete every session seen by a full scan, one page at a time, and return
   * how many were removed. A page whose delete fails is logged and skipped.
   */
  async terminateAllSessions(ctx: SessionContext): Promise<AuthResult<number>> {
    let terminated = 0;

    try {
      for await (const page of ctx.sessions.scan()) {
        try {
          terminated += await ctx.sessions.deleteMany(page);
        } catch (error) {
          this.logger.warn(
            `Skipped ${page.length} sessions during bulk termination: ${describeError(error)}`,
          );
        }
      }
    } catch (error) {
      return err(this.storeUnavailable('session scan', error));
    }

    this.logger.log(`All sessions terminated by administrator (${terminated})`);
    return ok(terminated);
  }

  // ── Private Helpers ───────────────────────────────────────

  private async checkSession(
    ctx: SessionContext,
    userId: string,
  ): Promise<AuthResult<void>> {
    const marker = await this.attempt('session read', () =>
      ctx.sessions.get(userId),
    );
    if (marker.isErr()) return err(marker.error);

    if (marker.value !== userId) {
      return err(
        authError(AuthErrorKind.SESSION_NOT_FOUND, `No live session for user ${userId}`),
      );
    }
    return ok(undefined);
  }

  private async describeSession(
    ctx: SessionContext,
    userId: string,
  ): Promise<SessionListing | null> {
    try {
      const user = await ctx.users.findById(userId);
      if (!user) {
        this.logger.warn(`Skipping session of unknown user ${userId}`);
        return null;
      }
      return {
        userId: user.id,
        username: user.username,
        email: user.email,
        isActive: user.isActive,
        isSuperuser: user.isSuperuser,
      };
    } catch (error) {
      this.logger.warn(`Skipping session ${userId}: ${describeError(error)}`);
      return null;
    }
  }

  /** Run a store call, turning any rejection into STORE_UNAVAILABLE */
  private async attempt<T>(
    operation: string,
    call: () => Promise<T>,
  ): Promise<AuthResult<T>> {
    try {
      return ok(await call());
    } catch (error) {
      return err(this.storeUnavailable(operation, error));
    }
  }

  private storeUnavailable(operation: string, error: unknown): AuthError {
    this.logger.error(
      `Store failure during ${operation}: ${describeError(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    return authError(
      AuthErrorKind.STORE_UNAVAILABLE,
      `Store failure during ${operation}`,
    );
  }
}

function notAuthenticated(): AuthError {
  return authError(AuthErrorKind.NOT_AUTHENTICATED, 'Invalid username or password');
}
