import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimitError, RateLimiter } from '../../../../src/shared/security/rate-limit';

function makeLimiter(opts?: { disabled?: boolean }) {
  let nowMs = 1_000_000;
  const cache = new InMemCache({ now: () => nowMs });
  const limiter = new RateLimiter(cache, { prefix: 'rl', disabled: opts?.disabled });

  return {
    limiter,
    advance(ms: number) {
      nowMs += ms;
    },
  };
}

const rule = { key: 'login:email:k1', limit: 2, windowSeconds: 60 };

describe('RateLimiter.hitOrThrow', () => {
  it('allows up to the limit, then throws with the prefixed key', async () => {
    const { limiter } = makeLimiter();

    await limiter.hitOrThrow(rule);
    await limiter.hitOrThrow(rule);

    const err = await limiter.hitOrThrow(rule).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitError);
    if (err instanceof RateLimitError) {
      expect(err.key).toBe('rl:login:email:k1');
      expect(err.limit).toBe(2);
      expect(err.windowSeconds).toBe(60);
    }
  });

  it('starts a new window once the first one expires', async () => {
    const { limiter, advance } = makeLimiter();

    await limiter.hitOrThrow(rule);
    await limiter.hitOrThrow(rule);
    advance(60_000);

    await expect(limiter.hitOrThrow(rule)).resolves.toBeUndefined();
  });

  it('keeps separate counters per key', async () => {
    const { limiter } = makeLimiter();

    await limiter.hitOrThrow(rule);
    await limiter.hitOrThrow(rule);

    await expect(limiter.hitOrThrow({ ...rule, key: 'login:email:k2' })).resolves.toBeUndefined();
  });

  it('does nothing when disabled', async () => {
    const { limiter } = makeLimiter({ disabled: true });

    for (let i = 0; i < 5; i++) {
      await limiter.hitOrThrow(rule);
    }
  });
});

describe('RateLimiter.hitOrSkip', () => {
  it('returns false instead of throwing once over the limit', async () => {
    const { limiter } = makeLimiter();

    expect(await limiter.hitOrSkip(rule)).toBe(true);
    expect(await limiter.hitOrSkip(rule)).toBe(true);
    expect(await limiter.hitOrSkip(rule)).toBe(false);
  });
});
