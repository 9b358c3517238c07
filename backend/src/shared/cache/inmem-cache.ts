/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Lets tests (and a Redis-less local run) use rate limiting without external infra.
 * - Mirrors RedisCache window semantics: the first hit fixes the expiry.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - new InMemCache({ now: () => fakeNowMs }) to control time in tests
 */

import type { Cache } from './cache';

type CounterEntry = { value: number; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly counters = new Map<string, CounterEntry>();
  private readonly now: () => number;

  constructor(opts?: { now?: () => number }) {
    this.now = opts?.now ?? (() => Date.now());
  }

  private liveEntry(key: string): CounterEntry | null {
    const entry = this.counters.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.counters.delete(key);
      return null;
    }

    return entry;
  }

  incr(key: string, opts?: { ttlSeconds?: number }): Promise<number> {
    const entry = this.liveEntry(key);
    const value = (entry?.value ?? 0) + 1;

    let expiresAtMs = entry?.expiresAtMs ?? null;
    if (expiresAtMs === null && opts?.ttlSeconds) {
      expiresAtMs = this.now() + opts.ttlSeconds * 1000;
    }

    this.counters.set(key, { value, expiresAtMs });
    return Promise.resolve(value);
  }

  close(): Promise<void> {
    this.counters.clear();
    return Promise.resolve();
  }
}
