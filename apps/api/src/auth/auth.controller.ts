import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  Query,
  Req,
  Res,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { AUTH_CONFIG, type AuthConfig } from '../config/auth.config';
import type { UserIdentity } from '../users/dto/user-identity.dto';
import { UsersService } from '../users/users.service';
import { CurrentUser } from './decorators/current-user.decorator';
import { AuthErrorKind } from './errors/auth-error';
import { AuthResponseDto, LoginDto, RefreshTokenDto, RegisterDto } from './dto';
import { InvalidTokenException, toHttpException, unwrapOrThrow } from './exceptions';
import { SessionContextFactory } from './session-context';
import { SessionManager } from './session-manager.service';
import { clearAuthCookies, setAuthCookies } from './utils/auth-cookies';
import {
  extractRefreshToken,
  isSafeRedirect,
  readCookie,
} from './utils/token-extractor';

/**
 * AuthController — REST endpoints for the session lifecycle.
 *
 * Routes:
 * - POST /auth/register  → Create an account (public)
 * - POST /auth/login     → Start a session, receive tokens + cookies (public)
 * - GET  /auth/refresh   → Cookie refresh, then redirect back (public)
 * - POST /auth/refresh   → Exchange a refresh token for a new pair (public)
 * - POST /auth/logout    → End the session, clear cookies (protected)
 */
@Controller('auth')
export class AuthController {
  constructor(
    private readonly sessionManager: SessionManager,
    private readonly usersService: UsersService,
    private readonly contexts: SessionContextFactory,
    @Inject(AUTH_CONFIG) private readonly config: AuthConfig,
  ) {}

  /**
   * @returns 201 Created with the new identity
   * @throws 409 Conflict if username or email is taken
   * @throws 400 Bad Request if validation fails
   */
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() dto: RegisterDto): Promise<UserIdentity> {
    return unwrapOrThrow(
      await this.usersService.register(this.contexts.create(), dto),
    );
  }

  /**
   * @returns 200 OK with the token pair; the same tokens are set as cookies
   * @throws 401 Unauthorized if credentials are invalid
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(
    @Body() dto: LoginDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<AuthResponseDto> {
    const pair = unwrapOrThrow(
      await this.sessionManager.login(
        this.contexts.create(),
        dto.username,
        dto.password,
      ),
    );

    setAuthCookies(res, pair, this.config);
    return new AuthResponseDto(pair);
  }

  /**
   * Browser flow: the access gate sends expired sessions here with the URL
   * they were after. Refreshes from the cookie and redirects back to
   * `redirect_url` when it is a same-origin path, otherwise home. An
   * authentication failure clears the cookies and redirects to login; a store
   * fault answers 500 and leaves the cookies alone.
   */
  @Get('refresh')
  async refreshAndRedirect(
    @Query('redirect_url') redirectUrl: string | undefined,
    @Req() req: Request,
    @Res() res: Response,
  ): Promise<void> {
    const refreshToken = readCookie(req, this.config.cookies.refreshName);
    const refreshed = refreshToken
      ? await this.sessionManager.refresh(this.contexts.create(), refreshToken)
      : null;

    if (
      refreshed &&
      refreshed.isErr() &&
      refreshed.error.kind === AuthErrorKind.STORE_UNAVAILABLE
    ) {
      throw toHttpException(refreshed.error);
    }

    if (!refreshed || refreshed.isErr()) {
      clearAuthCookies(res, this.config.cookies);
      res.redirect(302, this.config.routes.login);
      return;
    }

    setAuthCookies(res, refreshed.value, this.config);
    res.redirect(
      302,
      isSafeRedirect(redirectUrl) ? redirectUrl : this.config.routes.home,
    );
  }

  /**
   * API flow: the refresh token comes from the body, its cookie, or the
   * bearer header.
   *
   * @returns 200 OK with a new token pair
   * @throws 401 Unauthorized if the token is missing, expired, of the wrong
   *   type or its session has ended
   */
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(
    @Body() dto: RefreshTokenDto,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ): Promise<AuthResponseDto> {
    const refreshToken = extractRefreshToken(
      req,
      this.config.cookies,
      dto.refreshToken,
    );
    if (!refreshToken) {
      throw new InvalidTokenException();
    }

    const pair = unwrapOrThrow(
      await this.sessionManager.refresh(this.contexts.create(), refreshToken),
    );

    setAuthCookies(res, pair, this.config);
    return new AuthResponseDto(pair);
  }

  /** @returns 204 No Content; cookies are cleared even if no session existed */
  @Post('logout')
  @HttpCode(HttpStatus.NO_CONTENT)
  async logout(
    @CurrentUser() user: UserIdentity,
    @Res({ passthrough: true }) res: Response,
  ): Promise<void> {
    unwrapOrThrow(await this.sessionManager.logout(this.contexts.create(), user.id));
    clearAuthCookies(res, this.config.cookies);
  }
}
