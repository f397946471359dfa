/**
 * Topic Radar — Request Cache
 *
 * Memoizes collector requests by signature and gates them through the
 * provider rate limiter. This is the dedup-of-work layer; dedup of content
 * happens in the event store.
 *
 * Constructed once per process and handed to every collector call.
 */

import { RateLimiter, type LimitPolicy } from './rate-limiter';
import { signatureKey, canonicalSignature, type RequestSignature } from './signature';
import { errorMessage, logger } from '../lib/logger';

const DEFAULT_NEGATIVE_TTL_MS = 60_000;

type CacheEntry =
  | { kind: 'payload'; payload: unknown; storedAt: number; ttlMs: number }
  | { kind: 'failure'; error: unknown; storedAt: number; ttlMs: number };

export interface CacheFetchOptions {
  signal?: AbortSignal;
}

export interface CacheStats {
  entries: number;
  live: number;
  expired: number;
  inFlight: number;
}

export interface RequestCacheOptions {
  rateLimiter?: RateLimiter;
  now?: () => number;
}

export class RequestCache {
  readonly rateLimiter: RateLimiter;
  private readonly now: () => number;
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<unknown>>();
  private readonly log = logger.child({ component: 'RequestCache' });

  constructor(options: RequestCacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(this.now);
  }

  /**
   * Return the payload for `signature`, calling `producer` only when no live
   * entry exists. `parse` turns the raw payload into the caller's type on
   * both the fresh and the cached path.
   */
  async fetch<T>(
    signature: RequestSignature,
    ttlMs: number,
    policy: LimitPolicy,
    producer: () => Promise<unknown>,
    parse: (payload: unknown) => T,
    options: CacheFetchOptions = {}
  ): Promise<T> {
    const key = signatureKey(signature);

    const entry = this.liveEntry(key);
    if (entry) {
      this.log.debug('Cache hit', { signature: canonicalSignature(signature), kind: entry.kind });
      if (entry.kind === 'failure') throw entry.error;
      return parse(entry.payload);
    }

    let pending = this.inFlight.get(key);
    if (!pending) {
      pending = this.produce(key, signature, ttlMs, policy, producer, parse, options);
      this.inFlight.set(key, pending);
      const clear = () => {
        if (this.inFlight.get(key) === pending) this.inFlight.delete(key);
      };
      pending.then(clear, clear);
    }

    return parse(await pending);
  }

  /**
   * Drop expired entries. Returns the number removed.
   */
  clearExpired(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!this.isLive(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.log.info('Cleared expired cache entries', { removed });
    }
    return removed;
  }

  stats(): CacheStats {
    let live = 0;
    for (const entry of this.entries.values()) {
      if (this.isLive(entry)) live++;
    }
    return {
      entries: this.entries.size,
      live,
      expired: this.entries.size - live,
      inFlight: this.inFlight.size,
    };
  }

  private async produce<T>(
    key: string,
    signature: RequestSignature,
    ttlMs: number,
    policy: LimitPolicy,
    producer: () => Promise<unknown>,
    parse: (payload: unknown) => T,
    options: CacheFetchOptions
  ): Promise<unknown> {
    // RateLimited propagates from here without touching the cache
    const ticket = await this.rateLimiter.acquire(signature.provider, policy, options.signal);

    try {
      const payload = await producer();
      // A payload the caller cannot read counts as a failed call
      parse(payload);
      this.entries.set(key, { kind: 'payload', payload, storedAt: this.now(), ttlMs });
      return payload;
    } catch (error) {
      await this.rateLimiter.refund(ticket);

      const negativeTtlMs = policy.negativeTtlMs ?? DEFAULT_NEGATIVE_TTL_MS;
      if (negativeTtlMs > 0) {
        this.entries.set(key, { kind: 'failure', error, storedAt: this.now(), ttlMs: negativeTtlMs });
      }

      this.log.warn('Producer failed', {
        signature: canonicalSignature(signature),
        error: errorMessage(error),
        negativeTtlMs,
      });
      throw error;
    }
  }

  private liveEntry(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    return entry && this.isLive(entry) ? entry : undefined;
  }

  private isLive(entry: CacheEntry): boolean {
    return this.now() - entry.storedAt < entry.ttlMs;
  }
}
