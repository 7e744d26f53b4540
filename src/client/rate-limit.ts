import { z } from 'zod';
import { RatelimitError } from './types.js';

export const RATELIMIT_METHODS = ['throw', 'wait', 'pace'] as const;
export type RatelimitMethod = (typeof RATELIMIT_METHODS)[number];

// All timestamps are epoch milliseconds
export interface RateLimitState {
  limit: number;
  remaining: number;
  resetAt: number;
  lastCallAt: number;
  paceFactor: number;
}

export type Clock = () => number;
export type Sleep = (ms: number) => Promise<void>;

// Internal helper: sleep for a given number of milliseconds
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const DEFAULT_PACE_FACTOR = 0.9;

// Before the first response arrives we assume a fresh window of the service's default size
const DEFAULT_LIMIT = 150;

export function createRateLimitState(now: number, paceFactor: number): RateLimitState {
  return {
    limit: DEFAULT_LIMIT,
    remaining: DEFAULT_LIMIT,
    resetAt: now,
    lastCallAt: now,
    paceFactor,
  };
}

const integerHeader = z.string().regex(/^-?\d+$/).transform(Number);

const RateLimitHeadersSchema = z.object({
  'x-ratelimit-limit': integerHeader.pipe(z.number().nonnegative()),
  'x-ratelimit-remaining': integerHeader,
  'x-ratelimit-reset': z.string().datetime({ offset: true }),
});

type Headers = Record<string, string | string[] | undefined>;

/**
 * computePaceDelay — pure function returning how long to wait before the next call in "pace" mode.
 *
 * Spreads the remaining calls evenly over the time left in the window, credits the time
 * already spent since the previous call, and scales the result by the pace factor so we
 * sleep a little less than the exact spacing.
 */
export function computePaceDelay(state: RateLimitState, now: number): number {
  if (state.remaining === 0) {
    return Math.max(0, state.resetAt - now);
  }
  const spacing = (state.resetAt - now) / state.remaining;
  const remainingWait = spacing - (now - state.lastCallAt);
  return remainingWait > 0 ? remainingWait * state.paceFactor : 0;
}

export function isThrottled(body: unknown): boolean {
  return (
    typeof body === 'object' &&
    body !== null &&
    'error' in body &&
    body.error === 'Throttled'
  );
}

/**
 * RateLimiter — applies one session's rate-limit policy around each request.
 *
 * The state object belongs to the session and is mutated in place. There is no locking:
 * "wait" and "pace" assume one in-flight call per session.
 */
export class RateLimiter {
  constructor(
    readonly method: RatelimitMethod,
    readonly state: RateLimitState,
    private readonly clock: Clock = Date.now,
    private readonly pause: Sleep = sleep,
  ) {}

  // Proactive pacing — only "pace" ever blocks before a request
  async beforeRequest(): Promise<void> {
    if (this.method !== 'pace') return;
    const delay = computePaceDelay(this.state, this.clock());
    if (delay > 0) {
      await this.pause(delay);
    }
  }

  /**
   * Refresh from the response headers. Missing or malformed headers keep the previous window.
   *
   * @returns whether the window was refreshed
   */
  update(headers: Headers): boolean {
    this.state.lastCallAt = this.clock();
    const parsed = RateLimitHeadersSchema.safeParse(headers);
    if (!parsed.success) {
      return false;
    }
    const resetAt = Date.parse(parsed.data['x-ratelimit-reset']);
    this.state.limit = parsed.data['x-ratelimit-limit'];
    this.state.remaining = Math.max(0, parsed.data['x-ratelimit-remaining']);
    this.state.resetAt = Math.max(this.state.resetAt, resetAt);
    return true;
  }

  /**
   * Handles a throttled response. Throws under "throw"; otherwise sleeps until the
   * window resets and returns, telling the caller to replay the request.
   */
  async onThrottle(): Promise<void> {
    if (this.method === 'throw') {
      throw new RatelimitError(this.state.resetAt);
    }
    const toNext = this.state.resetAt - this.clock();
    if (toNext > 0) {
      await this.pause(toNext);
    }
  }
}
