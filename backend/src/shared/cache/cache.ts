/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Rate-limit counters must be shared across instances and expire on their own.
 * - Callers depend on this abstraction: Redis in production, in-memory in tests.
 */

export interface Cache {
  /**
   * Atomically increments a counter and returns the new value.
   * `ttlSeconds` is applied when the counter has no expiry yet (first hit of a window);
   * later hits do not extend the window.
   */
  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number>;

  close(): Promise<void>;
}
