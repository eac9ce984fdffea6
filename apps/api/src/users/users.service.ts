import { Injectable, Logger } from '@nestjs/common';
import { err, ok, type Result } from 'neverthrow';
import type { User } from '@sessiongate/database';
import type { SessionContext } from '../auth/session-context';
import { authError, AuthErrorKind, type AuthResult } from '../auth/errors/auth-error';
import type { RegisterDto } from '../auth/dto/register.dto';
import { UserIdentity } from './dto/user-identity.dto';
import type { UniqueViolation } from './interfaces/credential-store.interface';
import { PasswordHasher } from './password-hasher.service';

/**
 * UsersService — account creation.
 *
 * New accounts are active, unverified and not superusers.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(private readonly passwordHasher: PasswordHasher) {}

  /** Create an account; a taken username or email is a CONFLICT */
  async register(
    ctx: SessionContext,
    dto: RegisterDto,
  ): Promise<AuthResult<UserIdentity>> {
    const passwordHash = await this.passwordHasher.hash(dto.password);

    let inserted: Result<User, UniqueViolation>;
    try {
      inserted = await ctx.users.insert({
        username: dto.username,
        email: dto.email.toLowerCase(),
        passwordHash,
        isActive: true,
      });
    } catch (error) {
      this.logger.error(
        `Registration failed for "${dto.username}": ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return err(
        authError(AuthErrorKind.STORE_UNAVAILABLE, 'Store failure during registration'),
      );
    }

    if (inserted.isErr()) {
      const message =
        inserted.error.field === 'username'
          ? `Username "${dto.username}" is already taken`
          : `Email "${dto.email.toLowerCase()}" is already registered`;
      this.logger.warn(`Registration rejected: ${message}`);
      return err(authError(AuthErrorKind.CONFLICT, message));
    }

    const user = inserted.value;
    this.logger.log(`User registered: ${user.id} (${user.username})`);
    return ok(UserIdentity.fromEntity(user));
  }
}
