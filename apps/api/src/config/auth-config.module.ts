import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AUTH_CONFIG, buildAuthConfig } from './auth.config';

/**
 * AuthConfigModule — provides the AuthConfig object under AUTH_CONFIG.
 *
 * Global so that the auth, users and admin modules can inject it without
 * re-importing; the object itself is frozen configuration, not state.
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: AUTH_CONFIG,
      inject: [ConfigService],
      useFactory: buildAuthConfig,
    },
  ],
  exports: [AUTH_CONFIG],
})
export class AuthConfigModule {}
