/**
 * Thrown by a SessionStore when the backing store cannot serve a request
 * (connection refused, timeout, command error).
 */
export class SessionStoreError extends Error {
  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Session store ${operation} failed: ${detail}`, { cause });
    this.name = 'SessionStoreError';
  }
}
