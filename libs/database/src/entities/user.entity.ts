import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

/**
 * User entity — an account that can hold at most one live session.
 *
 * Invariants:
 * - Username and email are unique across all users
 * - Email is stored lower-cased
 * - Password is stored as a bcrypt hash, never in plaintext
 * - Only the boolean flags change after creation
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_users_username', { unique: true })
  @Column({ type: 'varchar', length: 20, unique: true })
  username!: string;

  @Index('IDX_users_email', { unique: true })
  @Column({ type: 'varchar', length: 255, unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  passwordHash!: string;

  @Column({ type: 'boolean', name: 'is_active', default: true })
  isActive!: boolean;

  /** Grants access to the /admin surface */
  @Column({ type: 'boolean', name: 'is_superuser', default: false })
  isSuperuser!: boolean;

  @Column({ type: 'boolean', name: 'is_verified', default: false })
  isVerified!: boolean;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;
}
