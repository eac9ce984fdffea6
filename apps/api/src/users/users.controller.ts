import { Controller, Get } from '@nestjs/common';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { UserIdentity } from './dto/user-identity.dto';

@Controller('users')
export class UsersController {
  /** The identity the access gate resolved for this request */
  @Get('me')
  getProfile(@CurrentUser() user: UserIdentity): UserIdentity {
    return user;
  }
}
