import { Controller, Delete, Get, HttpCode, HttpStatus, Param } from '@nestjs/common';
import {
  SessionContextFactory,
  SessionManager,
  unwrapOrThrow,
  type SessionListing,
} from '../auth';

/**
 * AdminController — session administration.
 *
 * Everything under the admin prefix is restricted to superusers by the
 * access gate before it reaches this controller.
 *
 * Routes:
 * - GET    /admin/sessions          → List live sessions
 * - DELETE /admin/sessions/:userId  → End one user's session
 * - DELETE /admin/sessions          → End every session
 */
@Controller('admin/sessions')
export class AdminController {
  constructor(
    private readonly sessionManager: SessionManager,
    private readonly contexts: SessionContextFactory,
  ) {}

  @Get()
  async list(): Promise<SessionListing[]> {
    return unwrapOrThrow(
      await this.sessionManager.listSessions(this.contexts.create()),
    );
  }

  @Delete(':userId')
  @HttpCode(HttpStatus.OK)
  async terminate(
    @Param('userId') userId: string,
  ): Promise<{ userId: string; terminated: boolean }> {
    const terminated = unwrapOrThrow(
      await this.sessionManager.terminateSession(this.contexts.create(), userId),
    );
    return { userId, terminated };
  }

  @Delete()
  @HttpCode(HttpStatus.OK)
  async terminateAll(): Promise<{ terminated: number }> {
    const terminated = unwrapOrThrow(
      await this.sessionManager.terminateAllSessions(this.contexts.create()),
    );
    return { terminated };
  }
}
