import { Module } from '@nestjs/common';
import { DatabaseModule } from '@sessiongate/database';
import { PasswordHasher } from './password-hasher.service';
import { UsersController } from './users.controller';
import { UsersRepository } from './users.repository';
import { UsersService } from './users.service';

/**
 * UsersModule — the credential store and account creation.
 *
 * Exports UsersRepository (the CredentialStore behind SessionContext) and
 * PasswordHasher for AuthModule.
 */
@Module({
  imports: [DatabaseModule.forFeature()],
  controllers: [UsersController],
  providers: [UsersRepository, PasswordHasher, UsersService],
  exports: [UsersRepository, PasswordHasher, UsersService],
})
export class UsersModule {}
