import { Injectable, Inject } from '@nestjs/common';
import Redis from 'ioredis';
import {
  DEFAULT_SCAN_PAGE_SIZE,
  REDIS_CLIENT,
  SESSION_KEY_PREFIX,
} from './redis.constants';
import { SessionStoreError } from './session-store.errors';
import type { SessionStore } from './session-store.interface';

/**
 * RedisSessionStore — session markers as plain Redis strings.
 *
 * Key pattern:  session:{userId}
 * Value:        {userId}
 *
 * Every ioredis failure is rethrown as SessionStoreError so callers only
 * ever deal with one infrastructure error type.
 */
@Injectable()
export class RedisSessionStore implements SessionStore {
  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
  ) {}

  static keyFor(userId: string): string {
    return `${SESSION_KEY_PREFIX}${userId}`;
  }

  async get(userId: string): Promise<string | null> {
    return this.run('get', () => this.client.get(RedisSessionStore.keyFor(userId)));
  }

  async set(userId: string): Promise<void> {
    await this.run('set', () =>
      this.client.set(RedisSessionStore.keyFor(userId), userId),
    );
  }

  async delete(userId: string): Promise<boolean> {
    const removed = await this.run('delete', () =>
      this.client.del(RedisSessionStore.keyFor(userId)),
    );
    return removed > 0;
  }

  async deleteMany(userIds: readonly string[]): Promise<number> {
    if (userIds.length === 0) return 0;
    const keys = userIds.map((id) => RedisSessionStore.keyFor(id));
    return this.run('deleteMany', () => this.client.del(...keys));
  }

  /**
   * Walks the key space with SCAN so large key sets never block Redis.
   * The same key can show up in more than one page; callers must tolerate it.
   */
  async *scan(pageSize: number = DEFAULT_SCAN_PAGE_SIZE): AsyncGenerator<string[]> {
    const pattern = `${SESSION_KEY_PREFIX}*`;
    let cursor = '0';

    do {
      const [next, keys] = await this.run('scan', () =>
        this.client.scan(cursor, 'MATCH', pattern, 'COUNT', pageSize),
      );
      cursor = next;

      if (keys.length > 0) {
        yield keys.map((key) => key.slice(SESSION_KEY_PREFIX.length));
      }
    } while (cursor !== '0');
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      throw new SessionStoreError(operation, error);
    }
  }
}
