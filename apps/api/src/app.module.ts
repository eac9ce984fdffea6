import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseModule } from '@sessiongate/database';
import { RedisModule } from '@sessiongate/redis';
import { AdminModule } from './admin/admin.module';
import { AuthModule } from './auth/auth.module';
import { AuthConfigModule } from './config/auth-config.module';
import { validateEnvironment } from './config/env.validation';
import { HealthModule } from './health/health.module';
import { UsersModule } from './users/users.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      validate: validateEnvironment,
    }),
    AuthConfigModule,

    // ── Database ──────────────────────────────────────────
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres' as const,
        host: configService.get<string>('POSTGRES_HOST', 'localhost'),
        port: configService.get<number>('POSTGRES_PORT', 5432),
        username: configService.get<string>('POSTGRES_USER', 'sessiongate'),
        password: configService.get<string>(
          'POSTGRES_PASSWORD',
          'sessiongate_secret',
        ),
        database: configService.get<string>('POSTGRES_DB', 'sessiongate'),
        entities: [...DatabaseModule.entities],
        migrations: [...DatabaseModule.migrations],
        migrationsRun: configService.get<boolean>('DB_MIGRATIONS_RUN', false),
        synchronize: false,
        logging: configService.get<string>('NODE_ENV') !== 'production',
      }),
    }),

    // ── Session Store ─────────────────────────────────────
    RedisModule.forRoot(),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    UsersModule,
    AuthModule,
    AdminModule,
  ],
})
export class AppModule {}
