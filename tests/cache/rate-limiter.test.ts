/**
 * Tests for the provider rate limiter
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RateLimiter, type LimitPolicy } from '../../src/cache/rate-limiter';
import { RateLimited } from '../../src/lib/errors';

const policy: LimitPolicy = { maxCalls: 2, windowMs: 1000, maxWaitMs: 5000 };

describe('RateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-03-01T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should grant calls up to the window quota', async () => {
    const limiter = new RateLimiter(() => Date.now());

    await limiter.acquire('github', policy);
    await limiter.acquire('github', policy);

    expect(limiter.getState('github')?.count).toBe(2);
  });

  it('should suspend the caller until the window resets', async () => {
    const limiter = new RateLimiter(() => Date.now());
    await limiter.acquire('github', policy);
    await limiter.acquire('github', policy);

    let granted = false;
    const third = limiter.acquire('github', policy).then(ticket => {
      granted = true;
      return ticket;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(granted).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    const ticket = await third;

    expect(granted).toBe(true);
    expect(ticket.windowStart).toBe(Date.parse('2025-03-01T12:00:01Z'));
    expect(limiter.getState('github')?.count).toBe(1);
  });

  it('should keep separate windows per provider', async () => {
    const limiter = new RateLimiter(() => Date.now());
    await limiter.acquire('github', policy);
    await limiter.acquire('github', policy);

    await limiter.acquire('reddit', policy);

    expect(limiter.getState('github')?.count).toBe(2);
    expect(limiter.getState('reddit')?.count).toBe(1);
  });

  it('should throw RateLimited when the wait exceeds maxWaitMs', async () => {
    const limiter = new RateLimiter(() => Date.now());
    const strict: LimitPolicy = { maxCalls: 1, windowMs: 1000, maxWaitMs: 500 };
    await limiter.acquire('github', strict);

    const error = await limiter.acquire('github', strict).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimited);
    if (error instanceof RateLimited) {
      expect(error.provider).toBe('github');
      expect(error.retryAfterMs).toBe(1000);
    }
  });

  it('should stop waiting when the signal aborts', async () => {
    const limiter = new RateLimiter(() => Date.now());
    await limiter.acquire('github', policy);
    await limiter.acquire('github', policy);

    const controller = new AbortController();
    const waiting = limiter.acquire('github', policy, controller.signal);
    controller.abort();

    await expect(waiting).rejects.toThrow('wait cancelled');
  });

  it('should give back a refunded slot in the same window', async () => {
    const limiter = new RateLimiter(() => Date.now());
    await limiter.acquire('github', policy);
    const ticket = await limiter.acquire('github', policy);

    await limiter.refund(ticket);

    expect(limiter.getState('github')?.count).toBe(1);
  });

  it('should ignore a refund once the window has moved on', async () => {
    const limiter = new RateLimiter(() => Date.now());
    const stale = await limiter.acquire('github', policy);

    vi.advanceTimersByTime(1000);
    await limiter.acquire('github', policy);
    await limiter.refund(stale);

    expect(limiter.getState('github')?.count).toBe(1);
  });
});
