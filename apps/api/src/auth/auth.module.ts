import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { UsersModule } from '../users/users.module';
import { AuthController } from './auth.controller';
import { AccessGate } from './gate/access-gate.service';
import { AccessGateMiddleware } from './gate/access-gate.middleware';
import { SessionContextFactory } from './session-context';
import { SessionManager } from './session-manager.service';
import { TokenCodec } from './token/token-codec.service';

/**
 * AuthModule — the session lifecycle and the access gate.
 *
 * Provides:
 * - TokenCodec for signing and verifying tokens
 * - SessionManager for login / refresh / logout / resolution
 * - AccessGate, applied to every route through AccessGateMiddleware
 * - REST endpoints under /auth
 *
 * JwtModule is registered without options; TokenCodec passes secret and
 * algorithm from AuthConfig on every call.
 */
@Module({
  imports: [UsersModule, JwtModule.register({})],
  controllers: [AuthController],
  providers: [TokenCodec, SessionManager, SessionContextFactory, AccessGate],
  exports: [SessionManager, SessionContextFactory],
})
export class AuthModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(AccessGateMiddleware).forRoutes('*');
  }
}
