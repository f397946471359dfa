/**
 * Topic Radar — Provider Rate Limiter
 *
 * Fixed-window quota per provider. A caller over quota waits for the
 * window to reset, or gets RateLimited when the wait exceeds maxWaitMs.
 * All state changes for a provider happen under that provider's lock.
 */

import { KeyedMutex, sleep } from '../lib/concurrency';
import { RateLimited } from '../lib/errors';
import { logger } from '../lib/logger';

export interface LimitPolicy {
  /** Calls allowed per window */
  maxCalls: number;
  windowMs: number;
  /** Longest a caller may wait for the window to reset */
  maxWaitMs: number;
  /** TTL of the negative cache entry written after a failed call (0 disables) */
  negativeTtlMs?: number;
}

export interface RateLimitState {
  windowStart: number;
  count: number;
  lastCallAt: number | null;
}

/**
 * Proof of a reserved slot; handed back to refund a failed call.
 */
export interface QuotaTicket {
  provider: string;
  windowStart: number;
}

type Reservation =
  | { granted: true; ticket: QuotaTicket }
  | { granted: false; waitMs: number };

export class RateLimiter {
  private readonly states = new Map<string, RateLimitState>();
  private readonly locks = new KeyedMutex();
  private readonly log = logger.child({ component: 'RateLimiter' });

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Reserve one call for `provider`, suspending while its window is exhausted.
   */
  async acquire(provider: string, policy: LimitPolicy, signal?: AbortSignal): Promise<QuotaTicket> {
    const deadline = this.now() + policy.maxWaitMs;

    for (;;) {
      const reservation = await this.locks.runExclusive(provider, () =>
        this.reserve(provider, policy)
      );

      if (reservation.granted) return reservation.ticket;

      const { waitMs } = reservation;
      if (this.now() + waitMs > deadline) {
        throw new RateLimited(provider, waitMs);
      }

      this.log.debug('Quota exhausted, waiting for window reset', { provider, waitMs });
      const completed = await sleep(waitMs, signal);
      if (!completed) {
        throw new RateLimited(provider, waitMs, 'wait cancelled');
      }
    }
  }

  /**
   * Give back a slot whose call failed. Ignored once the window has moved on.
   */
  async refund(ticket: QuotaTicket): Promise<void> {
    await this.locks.runExclusive(ticket.provider, () => {
      const state = this.states.get(ticket.provider);
      if (state && state.windowStart === ticket.windowStart && state.count > 0) {
        state.count--;
      }
    });
  }

  getState(provider: string): Readonly<RateLimitState> | undefined {
    const state = this.states.get(provider);
    return state ? { ...state } : undefined;
  }

  private reserve(provider: string, policy: LimitPolicy): Reservation {
    const now = this.now();
    let state = this.states.get(provider);

    if (!state || now - state.windowStart >= policy.windowMs) {
      state = { windowStart: now, count: 0, lastCallAt: state?.lastCallAt ?? null };
      this.states.set(provider, state);
    }

    if (state.count < policy.maxCalls) {
      state.count++;
      state.lastCallAt = now;
      return { granted: true, ticket: { provider, windowStart: state.windowStart } };
    }

    return { granted: false, waitMs: state.windowStart + policy.windowMs - now };
  }
}
