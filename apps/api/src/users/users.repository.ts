import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository } from 'typeorm';
import { User } from '@sessiongate/database';
import { err, ok, type Result } from 'neverthrow';
import type {
  CredentialStore,
  NewUser,
  UniqueViolation,
} from './interfaces/credential-store.interface';

/** PostgreSQL unique_violation */
const UNIQUE_VIOLATION = '23505';

/**
 * Maps a failed INSERT to the column it collided with, or `null` when the
 * failure was anything other than a unique violation.
 */
export function uniqueViolationOf(error: unknown): UniqueViolation | null {
  if (!(error instanceof QueryFailedError)) {
    return null;
  }

  const driverError: unknown = error.driverError;
  if (
    typeof driverError !== 'object' ||
    driverError === null ||
    !('code' in driverError) ||
    driverError.code !== UNIQUE_VIOLATION
  ) {
    return null;
  }

  const constraint =
    'constraint' in driverError && typeof driverError.constraint === 'string'
      ? driverError.constraint
      : '';

  return { field: constraint.includes('email') ? 'email' : 'username' };
}

/**
 * UsersRepository — the CredentialStore over TypeORM.
 *
 * `insert` checks both unique columns up front so the usual conflict is
 * reported without a failed statement; two registrations racing past the
 * check are still caught by the unique constraints.
 */
@Injectable()
export class UsersRepository implements CredentialStore {
  constructor(
    @InjectRepository(User)
    private readonly repository: Repository<User>,
  ) {}

  findById(id: string): Promise<User | null> {
    return this.repository.findOne({ where: { id } });
  }

  findByUsername(username: string): Promise<User | null> {
    return this.repository.findOne({ where: { username } });
  }

  async insert(newUser: NewUser): Promise<Result<User, UniqueViolation>> {
    // ── Check for existing username / email ───────────────
    const existing = await this.repository.findOne({
      where: [{ username: newUser.username }, { email: newUser.email }],
      select: ['id', 'username', 'email'],
    });

    if (existing) {
      return err({
        field: existing.username === newUser.username ? 'username' : 'email',
      });
    }

    // ── Insert ────────────────────────────────────────────
    try {
      const saved = await this.repository.save(this.repository.create(newUser));
      return ok(saved);
    } catch (error) {
      const violation = uniqueViolationOf(error);
      if (violation) {
        return err(violation);
      }
      throw error;
    }
  }
}
