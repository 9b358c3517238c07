/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Throttles credential-guessing and email-flooding endpoints:
 *   - login:          5 / 15min per email, 20 / 15min per IP
 *   - register:       5 / 15min per email, 20 / 15min per IP
 *   - reset complete: 5 / 15min per IP
 *   - reset request:  3 / hour per email (silent)
 * - Counters live in Redis in production; depends only on Cache.
 *
 * TWO MODES:
 * - hitOrThrow: over the limit -> RateLimitError (error handler answers 429).
 * - hitOrSkip: over the limit -> false. Used where the response must not change
 *   (password reset request always answers 200 with the generic message).
 *
 * ATOMICITY:
 * - INCR-then-check. Concurrent hits each get their own counter value, so the
 *   one that crosses the limit is the one rejected.
 *
 * DISABLING:
 * - `disabled: true` skips all checks. Only the composition root (di.ts) sets it.
 */

import type { Cache } from '../cache/cache';

export type RateLimitRule = {
  key: string;
  limit: number;
  windowSeconds: number;
};

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  async hitOrThrow(rule: RateLimitRule): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(rule.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: rule.windowSeconds });

    if (current > rule.limit) {
      throw new RateLimitError(fullKey, rule.limit, rule.windowSeconds);
    }
  }

  async hitOrSkip(rule: RateLimitRule): Promise<boolean> {
    if (this.opts?.disabled) return true;

    const fullKey = this.buildKey(rule.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: rule.windowSeconds });

    return current <= rule.limit;
  }
}
