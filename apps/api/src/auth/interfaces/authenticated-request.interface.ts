import type { Request } from 'express';
import type { UserIdentity } from '../../users/dto/user-identity.dto';

/**
 * Express Request after the access gate has resolved a session.
 * Only routes the gate protects carry `user`.
 */
export interface AuthenticatedRequest extends Request {
  user: UserIdentity;
}
