import { Inject, Injectable, Logger, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { AUTH_CONFIG, type AuthConfig } from '../../config/auth.config';
import { AuthErrorKind } from '../errors/auth-error';
import { SessionContextFactory } from '../session-context';
import { clearAuthCookies } from '../utils/auth-cookies';
import { extractAccessToken, requestPath } from '../utils/token-extractor';
import { AccessGate } from './access-gate.service';
import { denialResponse } from './gate-response';

/**
 * AccessGateMiddleware — runs the AccessGate for every request.
 *
 * Allowed requests continue with the resolved identity on `request.user`;
 * denied ones are answered here and never reach a controller.
 */
@Injectable()
export class AccessGateMiddleware implements NestMiddleware {
  private readonly logger = new Logger(AccessGateMiddleware.name);

  constructor(
    private readonly gate: AccessGate,
    private readonly contexts: SessionContextFactory,
    @Inject(AUTH_CONFIG) private readonly config: AuthConfig,
  ) {}

  use(req: Request, res: Response, next: NextFunction): void {
    this.handle(req, res, next).catch(next);
  }

  private async handle(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    const path = requestPath(req.originalUrl);
    const decision = await this.gate.evaluate(
      { path, accessToken: extractAccessToken(req, this.config.cookies) },
      this.contexts.create(),
    );

    switch (decision.outcome) {
      case 'allowed':
        if (decision.identity) {
          Object.assign(req, { user: decision.identity });
        }
        next();
        return;

      case 'already-authenticated':
        res.redirect(302, this.config.routes.home);
        return;

      case 'denied': {
        const { error } = decision;
        if (error.kind === AuthErrorKind.FORBIDDEN) {
          this.logger.warn(`Admin access refused on ${path}: ${error.message}`);
        } else {
          this.logger.debug(`${req.method} ${path} denied: ${error.kind}`);
        }

        const response = denialResponse(error, req.originalUrl, this.config.routes);
        if (response.kind === 'redirect') {
          if (response.clearCookies) {
            clearAuthCookies(res, this.config.cookies);
          }
          res.redirect(302, response.location);
        } else {
          res.status(response.status).json(response.body);
        }
        return;
      }
    }
  }
}
