/**
 * Key-value store holding at most one session marker per user.
 *
 * A marker's value is the user id itself; its presence is what makes a
 * user's tokens usable. Markers carry no TTL, so they disappear only through
 * `delete` / `deleteMany`.
 */
export interface SessionStore {
  /** Returns the marker value, or null when the user has no session. */
  get(userId: string): Promise<string | null>;

  /** Creates or overwrites the marker for `userId`. */
  set(userId: string): Promise<void>;

  /** Removes the marker; resolves true when one existed. */
  delete(userId: string): Promise<boolean>;

  /** Removes several markers at once; resolves the number removed. */
  deleteMany(userIds: readonly string[]): Promise<number>;

  /**
   * Pages through every marker, yielding the user ids found in each page.
   * Markers created or removed during the scan may or may not be seen.
   */
  scan(pageSize?: number): AsyncIterable<string[]>;
}
