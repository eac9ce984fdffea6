import { Inject, Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  type HealthIndicatorResult,
} from '@nestjs/terminus';
import Redis from 'ioredis';
import { REDIS_CLIENT } from '@sessiongate/redis';

/** Terminus indicator for the session store: healthy iff PING answers PONG */
@Injectable()
export class RedisHealthIndicator extends HealthIndicator {
  constructor(@Inject(REDIS_CLIENT) private readonly client: Redis) {
    super();
  }

  async pingCheck(key: string): Promise<HealthIndicatorResult> {
    let reply: string;
    try {
      reply = await this.client.ping();
    } catch (error) {
      throw new HealthCheckError(
        'Redis check failed',
        this.getStatus(key, false, {
          message: error instanceof Error ? error.message : String(error),
        }),
      );
    }

    if (reply !== 'PONG') {
      throw new HealthCheckError(
        'Redis check failed',
        this.getStatus(key, false, { message: `Unexpected reply: ${reply}` }),
      );
    }

    return this.getStatus(key, true);
  }
}
