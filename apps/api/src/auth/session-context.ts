import { Inject, Injectable } from '@nestjs/common';
import { SESSION_STORE, type SessionStore } from '@sessiongate/redis';
import { UsersRepository } from '../users/users.repository';
import type { CredentialStore } from '../users/interfaces/credential-store.interface';

/**
 * Store handles for one request, passed explicitly into every
 * SessionManager and UsersService call.
 */
export interface SessionContext {
  readonly users: CredentialStore;
  readonly sessions: SessionStore;
}

/** Builds a SessionContext over the application's store connections */
@Injectable()
export class SessionContextFactory {
  constructor(
    private readonly users: UsersRepository,
    @Inject(SESSION_STORE) private readonly sessions: SessionStore,
  ) {}

  create(): SessionContext {
    return { users: this.users, sessions: this.sessions };
  }
}
