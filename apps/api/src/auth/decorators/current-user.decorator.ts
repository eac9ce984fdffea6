import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import type { UserIdentity } from '../../users/dto/user-identity.dto';
import type { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';

/**
 * Parameter decorator that extracts the identity the access gate attached.
 *
 * Usage:
 * ```ts
 * @Get('me')
 * getProfile(@CurrentUser() user: UserIdentity): UserIdentity {
 *   return user;
 * }
 * ```
 *
 * On a public route there is no identity and the decorator rejects with 401.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): UserIdentity => {
    const request = ctx.switchToHttp().getRequest<Partial<AuthenticatedRequest>>();
    if (!request.user) {
      throw new UnauthorizedException();
    }
    return request.user;
  },
);
