import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { RateBudgetExhaustedError, ScrapeCancelledError } from '../src/errors';
import { RateLimiter, delay } from '../src/scrapers/rateLimiter';

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function limiter(random: number, maxRequests = 10): RateLimiter {
    return new RateLimiter(
      {
        slow: { minDelayMs: 1000, maxDelayMs: 3000, maxRequests },
        fast: { minDelayMs: 0, maxDelayMs: 0, maxRequests },
      },
      { random: () => random, now: () => Date.now() },
    );
  }

  it('spaces sequential requests by a delay drawn from the configured range', async () => {
    const rate = limiter(0.5);
    const start = Date.now();
    const granted: number[] = [];

    const all = Promise.all([1, 2, 3].map(() => rate.acquire('slow').then(() => granted.push(Date.now() - start))));
    await vi.advanceTimersByTimeAsync(10_000);
    await all;

    expect(granted).toEqual([0, 2000, 4000]);
  });

  it('never spaces requests closer than the minimum delay', async () => {
    const rate = limiter(0);
    const start = Date.now();
    const granted: number[] = [];

    const all = Promise.all([1, 2, 3, 4].map(() => rate.acquire('slow').then(() => granted.push(Date.now() - start))));
    await vi.advanceTimersByTimeAsync(10_000);
    await all;

    expect(granted).toEqual([0, 1000, 2000, 3000]);
    for (let i = 1; i < granted.length; i++) {
      expect(granted[i] - granted[i - 1]).toBeGreaterThanOrEqual(1000);
    }
  });

  it('fails the request after the session budget instead of waiting', async () => {
    const rate = limiter(0, 3);
    await rate.acquire('fast');
    await rate.acquire('fast');
    await rate.acquire('fast');

    await expect(rate.acquire('fast')).rejects.toBeInstanceOf(RateBudgetExhaustedError);
    expect(rate.used('fast')).toBe(3);
  });

  it('does not make one source wait for another', async () => {
    const rate = limiter(1);
    await rate.acquire('slow');

    let secondSlowGranted = false;
    const secondSlow = rate.acquire('slow').then(() => {
      secondSlowGranted = true;
    });

    await rate.acquire('fast');
    expect(secondSlowGranted).toBe(false);

    await vi.advanceTimersByTimeAsync(3000);
    await secondSlow;
    expect(secondSlowGranted).toBe(true);
  });

  it('rejects a pending wait when the signal aborts and keeps serving afterwards', async () => {
    const rate = limiter(0);
    await rate.acquire('slow');

    const controller = new AbortController();
    const pending = rate.acquire('slow', controller.signal);
    const assertion = expect(pending).rejects.toBeInstanceOf(ScrapeCancelledError);
    controller.abort();
    await assertion;
    expect(rate.used('slow')).toBe(1);

    const next = rate.acquire('slow');
    await vi.advanceTimersByTimeAsync(1000);
    await next;
    expect(rate.used('slow')).toBe(2);
  });

  it('starts a fresh budget after reset', async () => {
    const rate = limiter(0, 1);
    await rate.acquire('fast');
    await expect(rate.acquire('fast')).rejects.toBeInstanceOf(RateBudgetExhaustedError);

    rate.reset();
    await rate.acquire('fast');
    expect(rate.used('fast')).toBe(1);
  });

  it('rejects sources without a policy', async () => {
    await expect(limiter(0).acquire('unknown')).rejects.toBeInstanceOf(RangeError);
  });
});

describe('delay', () => {
  it('rejects immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(delay(1000, controller.signal)).rejects.toBeInstanceOf(ScrapeCancelledError);
  });
});
