import { Inject, Injectable } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { AUTH_CONFIG, type AuthConfig } from '../config/auth.config';

/**
 * bcrypt with the configured cost factor. `compare` is constant-time with
 * respect to the candidate password.
 */
@Injectable()
export class PasswordHasher {
  constructor(@Inject(AUTH_CONFIG) private readonly config: AuthConfig) {}

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.config.passwordSaltRounds);
  }

  compare(password: string, passwordHash: string): Promise<boolean> {
    return bcrypt.compare(password, passwordHash);
  }
}
