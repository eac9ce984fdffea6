import type { User } from '@sessiongate/database';
import type { Result } from 'neverthrow';

/** Fields needed to create an account; flags fall back to column defaults */
export interface NewUser {
  username: string;
  email: string;
  passwordHash: string;
  isActive?: boolean;
  isSuperuser?: boolean;
  isVerified?: boolean;
}

/** Which unique column an insert collided with */
export interface UniqueViolation {
  field: 'username' | 'email';
}

/**
 * Persistent user records as the session lifecycle sees them.
 *
 * Lookups resolve to `null` when nothing matches. Infrastructure faults
 * reject; a uniqueness collision is an expected outcome and comes back as an
 * `err` Result.
 */
export interface CredentialStore {
  findById(id: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  insert(user: NewUser): Promise<Result<User, UniqueViolation>>;
}
