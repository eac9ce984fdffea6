import type { User } from '@sessiongate/database';

/**
 * Read-only view of an account. Never includes passwordHash.
 *
 * Uses a static factory method to enforce that we always map from the entity
 * explicitly, preventing accidental data leaks.
 */
export class UserIdentity {
  readonly id: string;
  readonly username: string;
  readonly email: string;
  readonly isActive: boolean;
  readonly isSuperuser: boolean;
  readonly isVerified: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;

  private constructor(user: User) {
    this.id = user.id;
    this.username = user.username;
    this.email = user.email;
    this.isActive = user.isActive;
    this.isSuperuser = user.isSuperuser;
    this.isVerified = user.isVerified;
    this.createdAt = user.createdAt;
    this.updatedAt = user.updatedAt;
  }

  /** This is the ONLY way to construct a UserIdentity. */
  static fromEntity(user: User): UserIdentity {
    return new UserIdentity(user);
  }
}
