import type { TokenPair } from '../token/token-claims.interface';

/**
 * Response shape for login and refresh.
 *
 * Follows the OAuth2 token response convention; the same tokens are also
 * set as http-only cookies.
 */
export class AuthResponseDto {
  accessToken: string;
  refreshToken: string;
  tokenType: 'Bearer';
  expiresIn: number;

  constructor(pair: TokenPair) {
    this.accessToken = pair.accessToken;
    this.refreshToken = pair.refreshToken;
    this.tokenType = 'Bearer';
    this.expiresIn = pair.expiresIn;
  }
}
