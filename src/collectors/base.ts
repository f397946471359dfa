/**
 * Topic Radar — Collector Base
 *
 * Abstract base class for all source collectors.
 * A collector turns one topic into a lazy sequence of raw candidates,
 * querying its provider once per keyword through the shared RequestCache.
 */

import type { CollectorSource, KeywordRule, RawCandidateEvent, Topic } from '../types';
import type { LimitPolicy, RequestCache, SignatureParams } from '../cache';
import { CollectorFailure, RateLimited } from '../lib/errors';
import { logger, type Logger } from '../lib/logger';

export interface CollectContext {
  cache: RequestCache;
  /** Run-level cancellation; no new requests are issued once aborted */
  signal?: AbortSignal;
}

export interface CollectorOptions {
  /** How long a response stays cached */
  ttlMs?: number;
}

const DEFAULT_TTL_MS = 3 * 60 * 60 * 1000;

export abstract class Collector {
  abstract readonly name: CollectorSource;
  abstract readonly limitPolicy: LimitPolicy;

  readonly ttlMs: number;

  private _logger?: Logger;

  constructor(options: CollectorOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
  }

  protected get logger(): Logger {
    this._logger ??= logger.child({ collector: this.name });
    return this._logger;
  }

  /**
   * Query one keyword of a topic.
   * Must be implemented by each collector, using `request` for network access.
   */
  protected abstract searchKeyword(
    keyword: KeywordRule,
    topic: Topic,
    ctx: CollectContext
  ): Promise<RawCandidateEvent[]>;

  /**
   * Yield candidates for every keyword of `topic`, deduplicated by externalId.
   * Provider errors surface as CollectorFailure; RateLimited passes through.
   */
  async *collect(topic: Topic, ctx: CollectContext): AsyncGenerator<RawCandidateEvent> {
    const seen = new Set<string>();

    for (const keyword of topic.keywords) {
      if (ctx.signal?.aborted) return;

      let events: RawCandidateEvent[];
      try {
        events = await this.searchKeyword(keyword, topic, ctx);
      } catch (error) {
        if (error instanceof RateLimited || error instanceof CollectorFailure) throw error;
        throw new CollectorFailure(this.name, topic.id, error);
      }

      this.logger.debug('Keyword searched', { topic: topic.id, keyword: keyword.term, found: events.length });

      for (const event of events) {
        if (seen.has(event.externalId)) continue;
        seen.add(event.externalId);
        yield event;
      }
    }
  }

  /**
   * Route one provider call through the request cache.
   */
  protected request<T>(
    ctx: CollectContext,
    topic: Topic,
    params: SignatureParams,
    producer: () => Promise<unknown>,
    parse: (payload: unknown) => T
  ): Promise<T> {
    return ctx.cache.fetch(
      { provider: this.name, topic: topic.id, params },
      this.ttlMs,
      this.limitPolicy,
      producer,
      parse,
      { signal: ctx.signal }
    );
  }

  /**
   * GET a JSON document, failing on non-2xx responses.
   */
  protected async getJson(url: string, headers: Record<string, string> = {}, signal?: AbortSignal): Promise<unknown> {
    const res = await fetch(url, { headers: { Accept: 'application/json', ...headers }, signal });
    if (!res.ok) {
      throw new Error(`${this.name} responded ${res.status} for ${new URL(url).pathname}`);
    }
    const body: unknown = await res.json();
    return body;
  }
}

/**
 * Static mapping from provider name to collector instance, built at startup.
 */
export class CollectorRegistry {
  private readonly collectors = new Map<CollectorSource, Collector>();

  constructor(collectors: Collector[] = []) {
    collectors.forEach(c => this.register(c));
  }

  register(collector: Collector): this {
    if (this.collectors.has(collector.name)) {
      throw new Error(`Collector already registered: ${collector.name}`);
    }
    this.collectors.set(collector.name, collector);
    logger.debug('Collector registered', { name: collector.name });
    return this;
  }

  get(name: CollectorSource): Collector | undefined {
    return this.collectors.get(name);
  }

  all(): Collector[] {
    return Array.from(this.collectors.values());
  }

  get size(): number {
    return this.collectors.size;
  }
}
