import { describe, it, expect } from 'vitest';
import {
  RateLimiter,
  computePaceDelay,
  createRateLimitState,
  isThrottled,
} from '../../src/client/rate-limit.js';
import { RatelimitError } from '../../src/client/types.js';
import { T0, fakeTime } from '../helpers/mock-server.js';

describe('computePaceDelay', () => {
  it('spreads the remaining calls over the window, scaled by the pace factor', () => {
    const state = { limit: 300, remaining: 10, resetAt: T0 + 100_000, lastCallAt: T0, paceFactor: 0.9 };
    expect(computePaceDelay(state, T0)).toBeCloseTo(9000);
  });

  it('credits the time already elapsed since the last call', () => {
    const now = T0 + 4000;
    const state = { limit: 300, remaining: 10, resetAt: now + 100_000, lastCallAt: T0, paceFactor: 0.9 };
    // 0.9 * (10 s - 4 s)
    expect(computePaceDelay(state, now)).toBeCloseTo(5400);
  });

  it('never returns a negative delay', () => {
    const now = T0 + 12_000;
    const state = { limit: 300, remaining: 10, resetAt: now + 100_000, lastCallAt: T0, paceFactor: 0.9 };
    expect(computePaceDelay(state, now)).toBe(0);
  });

  it('waits for the reset when no calls remain', () => {
    const state = { limit: 300, remaining: 0, resetAt: T0 + 30_000, lastCallAt: T0, paceFactor: 0.9 };
    expect(computePaceDelay(state, T0 + 10_000)).toBe(20_000);
    expect(computePaceDelay(state, T0 + 40_000)).toBe(0);
  });
});

describe('isThrottled', () => {
  it('recognises the throttle payload only', () => {
    expect(isThrottled({ error: 'Throttled' })).toBe(true);
    expect(isThrottled({ error: 'Record not found' })).toBe(false);
    expect(isThrottled([{ error: 'Throttled' }])).toBe(false);
    expect(isThrottled(null)).toBe(false);
  });
});

describe('RateLimiter', () => {
  it('refreshes the window from the response headers', () => {
    const time = fakeTime(T0);
    const limiter = new RateLimiter('wait', createRateLimitState(T0, 0.9), time.clock, time.sleep);
    time.now = T0 + 1500;

    limiter.update({
      'x-ratelimit-limit': '300',
      'x-ratelimit-remaining': '299',
      'x-ratelimit-reset': '2026-01-01T00:05:00.000Z',
    });

    expect(limiter.state).toEqual({
      limit: 300,
      remaining: 299,
      resetAt: Date.UTC(2026, 0, 1, 0, 5),
      lastCallAt: T0 + 1500,
      paceFactor: 0.9,
    });
  });

  it('keeps the previous window when the headers are missing, but records the call', () => {
    const time = fakeTime(T0);
    const limiter = new RateLimiter('wait', createRateLimitState(T0, 0.9), time.clock, time.sleep);
    time.now = T0 + 200;

    expect(limiter.update({ 'content-type': 'application/json' })).toBe(false);

    expect(limiter.state.remaining).toBe(150);
    expect(limiter.state.limit).toBe(150);
    expect(limiter.state.resetAt).toBe(T0);
    expect(limiter.state.lastCallAt).toBe(T0 + 200);
  });

  it('reads reset times with microsecond precision', () => {
    const time = fakeTime(T0);
    const limiter = new RateLimiter('wait', createRateLimitState(T0, 0.9), time.clock, time.sleep);

    const refreshed = limiter.update({
      'x-ratelimit-limit': '300',
      'x-ratelimit-remaining': '120',
      'x-ratelimit-reset': '2026-01-01T00:05:00.123456Z',
    });

    expect(refreshed).toBe(true);
    expect(limiter.state.resetAt).toBe(Date.UTC(2026, 0, 1, 0, 5, 0, 123));
  });

  it('treats empty or non-numeric counters as malformed', () => {
    const time = fakeTime(T0);
    const limiter = new RateLimiter('pace', createRateLimitState(T0, 0.9), time.clock, time.sleep);

    for (const remaining of ['', ' ', '12abc', '1.5']) {
      const refreshed = limiter.update({
        'x-ratelimit-limit': '300',
        'x-ratelimit-remaining': remaining,
        'x-ratelimit-reset': '2026-01-01T00:05:00.000000Z',
      });
      expect(refreshed).toBe(false);
    }
    expect(limiter.state).toMatchObject({ limit: 150, remaining: 150, resetAt: T0 });
  });

  it('never moves the reset time backwards and clamps remaining at zero', () => {
    const time = fakeTime(T0);
    const state = createRateLimitState(T0, 0.9);
    state.resetAt = T0 + 60_000;
    const limiter = new RateLimiter('wait', state, time.clock, time.sleep);

    limiter.update({
      'x-ratelimit-limit': '300',
      'x-ratelimit-remaining': '-1',
      'x-ratelimit-reset': new Date(T0 + 30_000).toISOString(),
    });

    expect(state.resetAt).toBe(T0 + 60_000);
    expect(state.remaining).toBe(0);
  });

  it('only blocks before a request in pace mode', async () => {
    for (const method of ['throw', 'wait'] as const) {
      const time = fakeTime(T0);
      const state = { limit: 300, remaining: 10, resetAt: T0 + 100_000, lastCallAt: T0, paceFactor: 0.9 };
      await new RateLimiter(method, state, time.clock, time.sleep).beforeRequest();
      expect(time.sleeps).toEqual([]);
    }

    const time = fakeTime(T0);
    const state = { limit: 300, remaining: 10, resetAt: T0 + 100_000, lastCallAt: T0, paceFactor: 0.5 };
    await new RateLimiter('pace', state, time.clock, time.sleep).beforeRequest();
    expect(time.sleeps).toEqual([5000]);
  });

  it('throws on throttle under the throw policy', async () => {
    const time = fakeTime(T0);
    const state = createRateLimitState(T0, 0.9);
    state.resetAt = T0 + 10_000;
    const limiter = new RateLimiter('throw', state, time.clock, time.sleep);

    const error = await limiter.onThrottle().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RatelimitError);
    expect(error).toMatchObject({ code: 'RATE_LIMITED', resetAt: T0 + 10_000 });
    expect(time.sleeps).toEqual([]);
  });

  it('sleeps until the reset on throttle under wait and pace', async () => {
    for (const method of ['wait', 'pace'] as const) {
      const time = fakeTime(T0);
      const state = createRateLimitState(T0, 0.9);
      state.resetAt = T0 + 7000;
      await new RateLimiter(method, state, time.clock, time.sleep).onThrottle();
      expect(time.sleeps).toEqual([7000]);
    }
  });

  it('does not sleep on throttle when the reset is already past', async () => {
    const time = fakeTime(T0 + 5000);
    const state = createRateLimitState(T0, 0.9);
    await new RateLimiter('wait', state, time.clock, time.sleep).onThrottle();
    expect(time.sleeps).toEqual([]);
  });
});
