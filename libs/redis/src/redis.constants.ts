/**
 * Injection tokens for the Redis module.
 *
 * String-based tokens keep consumers independent of the concrete client and
 * store classes.
 */
export const REDIS_CLIENT = 'REDIS_CLIENT';
export const SESSION_STORE = 'SESSION_STORE';

/** Every session marker lives under `session:<user_id>` */
export const SESSION_KEY_PREFIX = 'session:';

/** COUNT hint passed to SCAN when paging through markers */
export const DEFAULT_SCAN_PAGE_SIZE = 1000;
