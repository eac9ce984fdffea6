/** Which operation a token may be presented to */
export enum TokenType {
  ACCESS = 'access',
  REFRESH = 'refresh',
}

/**
 * Verified claims of a session token.
 *
 * `sub` follows the JWT standard claim for subject identifier and maps to
 * User.id. `jti` is random per token and is not tracked anywhere; it only
 * keeps two tokens issued in the same second from being identical.
 */
export interface TokenClaims {
  sub: string;
  type: TokenType;
  jti: string;
  iat: number;
  exp: number;
}

/** Claims supplied by the caller; the codec adds `jti`, `iat` and `exp` */
export type IssuableClaims = Pick<TokenClaims, 'sub' | 'type'>;

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  /** Access token lifetime in seconds */
  expiresIn: number;
}
