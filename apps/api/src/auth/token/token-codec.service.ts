import { randomUUID } from 'node:crypto';
import { Inject, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { err, ok } from 'neverthrow';
import { AUTH_CONFIG, type AuthConfig } from '../../config/auth.config';
import { authError, AuthErrorKind, type AuthResult } from '../errors/auth-error';
import {
  TokenType,
  type IssuableClaims,
  type TokenClaims,
  type TokenPair,
} from './token-claims.interface';

/** jsonwebtoken messages that mean "parsed, but not signed by us" */
const SIGNATURE_FAILURES = new Set([
  'invalid signature',
  'invalid algorithm',
  'jwt signature is required',
]);

const TOKEN_TYPES: ReadonlySet<string> = new Set(Object.values(TokenType));

function isTokenClaims(payload: unknown): payload is TokenClaims {
  return (
    typeof payload === 'object' &&
    payload !== null &&
    'sub' in payload &&
    typeof payload.sub === 'string' &&
    payload.sub.length > 0 &&
    'type' in payload &&
    typeof payload.type === 'string' &&
    TOKEN_TYPES.has(payload.type) &&
    'jti' in payload &&
    typeof payload.jti === 'string' &&
    'iat' in payload &&
    typeof payload.iat === 'number' &&
    'exp' in payload &&
    typeof payload.exp === 'number'
  );
}

/**
 * TokenCodec — issues and verifies signed, expiring session tokens.
 *
 * Secret and algorithm come from AuthConfig on every call, so the JwtModule
 * registration carries no options of its own.
 *
 * Verification order: signature, claims shape, token type, expiry. Expiry is
 * checked here rather than by jsonwebtoken so that a forged expired token
 * reports INVALID_SIGNATURE and never EXPIRED_SIGNATURE.
 */
@Injectable()
export class TokenCodec {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(AUTH_CONFIG) private readonly config: AuthConfig,
  ) {}

  issue(claims: IssuableClaims, ttlSeconds: number): string {
    return this.jwtService.sign(
      { sub: claims.sub, type: claims.type, jti: randomUUID() },
      {
        secret: this.config.tokens.secret,
        algorithm: this.config.tokens.algorithm,
        expiresIn: ttlSeconds,
      },
    );
  }

  /** Issue a fresh access + refresh pair for one user */
  issuePair(userId: string): TokenPair {
    const { accessTtlSeconds, refreshTtlSeconds } = this.config.tokens;

    return {
      accessToken: this.issue({ sub: userId, type: TokenType.ACCESS }, accessTtlSeconds),
      refreshToken: this.issue({ sub: userId, type: TokenType.REFRESH }, refreshTtlSeconds),
      expiresIn: accessTtlSeconds,
    };
  }

  verify(token: string, expectedType?: TokenType): AuthResult<TokenClaims> {
    // A signed payload that is not JSON comes back as a string.
    let payload: unknown;
    try {
      payload = this.jwtService.verify<object>(token, {
        secret: this.config.tokens.secret,
        algorithms: [this.config.tokens.algorithm],
        ignoreExpiration: true,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return SIGNATURE_FAILURES.has(message)
        ? err(authError(AuthErrorKind.INVALID_SIGNATURE, message))
        : err(authError(AuthErrorKind.MALFORMED, message));
    }

    if (!isTokenClaims(payload)) {
      return err(authError(AuthErrorKind.MALFORMED, 'Token claims are incomplete'));
    }

    if (expectedType !== undefined && payload.type !== expectedType) {
      return err(
        authError(
          AuthErrorKind.INVALID_TOKEN_TYPE,
          `Expected a ${expectedType} token, got ${payload.type}`,
        ),
      );
    }

    if (Math.floor(Date.now() / 1000) >= payload.exp) {
      return err(authError(AuthErrorKind.EXPIRED_SIGNATURE, 'Token has expired'));
    }

    return ok(payload);
  }
}
