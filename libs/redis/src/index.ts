/**
 * @sessiongate/redis
 *
 * Redis-backed session markers for the SessionGate API.
 *
 * Exports:
 *   - RedisModule.forRoot()   — import once into AppModule
 *   - RedisSessionStore       — SessionStore over ioredis
 *   - SessionStore            — interface the API depends on
 *   - SessionStoreError       — thrown on any Redis failure
 *   - REDIS_CLIENT, SESSION_STORE — injection tokens
 */
export { RedisModule } from './redis.module';
export { RedisSessionStore } from './redis-session-store';
export { SessionStoreError } from './session-store.errors';
export type { SessionStore } from './session-store.interface';
export {
  REDIS_CLIENT,
  SESSION_STORE,
  SESSION_KEY_PREFIX,
  DEFAULT_SCAN_PAGE_SIZE,
} from './redis.constants';
