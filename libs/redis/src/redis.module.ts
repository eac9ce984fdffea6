import {
  DynamicModule,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { REDIS_CLIENT, SESSION_STORE } from './redis.constants';
import { RedisSessionStore } from './redis-session-store';

/**
 * RedisModule — async dynamic module providing the session store.
 *
 * Usage:
 *   RedisModule.forRoot()  — once, in AppModule (registered as global)
 *
 * Exports:
 *   - REDIS_CLIENT:  the ioredis connection (health checks)
 *   - SESSION_STORE: RedisSessionStore behind the SessionStore interface
 */
@Module({})
export class RedisModule implements OnApplicationShutdown {
  private readonly logger = new Logger(RedisModule.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
  ) {}

  static forRoot(): DynamicModule {
    const clientProvider = {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): Redis => {
        return new Redis({
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: configService.get<number>('REDIS_PORT', 6379),
          password: configService.get<string>('REDIS_PASSWORD'),
          db: configService.get<number>('REDIS_DB', 0),
          // Retry strategy: exponential back-off capped at 10 s
          retryStrategy: (times: number) => Math.min(times * 100, 10_000),
          enableReadyCheck: true,
          maxRetriesPerRequest: 3,
          lazyConnect: false,
        });
      },
    };

    const sessionStoreProvider = {
      provide: SESSION_STORE,
      useExisting: RedisSessionStore,
    };

    return {
      module: RedisModule,
      imports: [ConfigModule],
      providers: [clientProvider, RedisSessionStore, sessionStoreProvider],
      exports: [REDIS_CLIENT, SESSION_STORE],
      global: true,
    };
  }

  async onApplicationShutdown(): Promise<void> {
    this.logger.log('Closing Redis connection');
    await this.client.quit();
  }
}
