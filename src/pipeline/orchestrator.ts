/**
 * Topic Radar — Ingestion Orchestrator
 *
 * Drives one run:
 * 1. Load topics (fatal on failure)
 * 2. Check the store is reachable (fatal on failure)
 * 3. For every (topic, collector) pair, on a bounded pool:
 *    collect -> classify against all topics -> upsert one row per match
 * 4. Return the run summary
 *
 * Collector failures and rate limits skip one pair; malformed events drop
 * one event; StoreUnavailable stops the run.
 */

import { nanoid } from 'nanoid';
import type { RawCandidateEvent, RunSummary, Topic } from '../types';
import type { Collector, CollectContext, CollectorRegistry } from '../collectors';
import type { RequestCache } from '../cache';
import type { EventStore } from '../store';
import { TopicMatcher } from '../matching/matcher';
import { selectTopicsForRun } from '../matching/topics';
import { fingerprint } from '../store/fingerprint';
import { createSemaphore, sleep } from '../lib/concurrency';
import {
  CollectorFailure,
  ConfigError,
  MatchError,
  RateLimited,
  StoreUnavailable,
  isFatal,
} from '../lib/errors';
import { errorMessage, logger, timeOperation, type Logger } from '../lib/logger';
import { RunSummaryBuilder } from './summary';

// ============================================================
// TYPES
// ============================================================

export interface OrchestratorDeps {
  registry: CollectorRegistry;
  cache: RequestCache;
  store: EventStore;
  /** Reads the topic configuration; called once per run */
  loadTopics: () => Promise<Topic[]>;
  matcher?: TopicMatcher;
}

export interface RunOptions {
  /** Pairs processed at once (default 4) */
  concurrency?: number;
  /** Cap on topics per run, rotated by category */
  maxTopics?: number;
  rotation?: number;
  /** Run-level timeout; no new pairs start once it fires */
  timeoutMs?: number;
  /** How long in-flight pairs may finish after cancellation (default 15s) */
  graceMs?: number;
  signal?: AbortSignal;
}

interface WorkItem {
  topic: Topic;
  collector: Collector;
}

/**
 * State shared by every pair of one run.
 */
interface RunState {
  topics: readonly Topic[];
  ctx: CollectContext;
  summary: RunSummaryBuilder;
  /** Fingerprints already upserted; a repeat within the run is skipped */
  upserted: Set<string>;
}

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_GRACE_MS = 15_000;

// ============================================================
// ORCHESTRATOR
// ============================================================

export class Orchestrator {
  private readonly matcher: TopicMatcher;

  constructor(private readonly deps: OrchestratorDeps) {
    this.matcher = deps.matcher ?? new TopicMatcher();
  }

  async run(options: RunOptions = {}): Promise<RunSummary> {
    const runId = nanoid(10);
    const log = logger.child({ runId });
    const summary = new RunSummaryBuilder(runId);

    log.info('Starting ingestion run', {
      collectors: this.deps.registry.all().map(c => c.name),
      concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
    });

    // LoadTopics
    const topics = await this.loadTopics(options);
    summary.setTopics(topics.length);

    await timeOperation('Store health check', () => this.deps.store.healthCheck(), log);

    const work: WorkItem[] = topics.flatMap(topic =>
      this.deps.registry.all().map(collector => ({ topic, collector }))
    );

    const controller = new AbortController();
    const cancel = () => controller.abort();
    options.signal?.addEventListener('abort', cancel, { once: true });
    if (options.signal?.aborted) cancel();
    const timer =
      options.timeoutMs !== undefined ? setTimeout(cancel, options.timeoutMs) : undefined;

    let fatal: unknown;
    const abortRun = (error: unknown) => {
      fatal ??= error;
      controller.abort();
    };

    const state: RunState = {
      topics,
      ctx: { cache: this.deps.cache, signal: controller.signal },
      summary,
      upserted: new Set(),
    };
    const semaphore = createSemaphore(options.concurrency ?? DEFAULT_CONCURRENCY);
    // Every pair waits for a slot; pairs that get one after cancellation never start
    const tasks = work.map(async item => {
      await semaphore.acquire();
      try {
        if (controller.signal.aborted) return;
        await this.processPair(item, state, log);
      } catch (error) {
        abortRun(error);
      } finally {
        semaphore.release();
      }
    });

    try {
      await this.settle(tasks, controller.signal, options.graceMs ?? DEFAULT_GRACE_MS, log);
    } finally {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', cancel);
    }

    if (fatal !== undefined) {
      log.error('Ingestion run aborted', { error: errorMessage(fatal) });
      throw fatal;
    }

    if (controller.signal.aborted) {
      summary.markCancelled();
    }

    const result = summary.build();
    log.info('Ingestion run completed', {
      outcome: result.outcome,
      collected: result.collected,
      matched: result.matched,
      duplicates: result.duplicates,
      inserted: result.inserted,
      updated: result.updated,
      failures: result.failures,
      cancelled: result.cancelled,
      durationMs: result.durationMs,
    });
    return result;
  }

  private async loadTopics(options: RunOptions): Promise<Topic[]> {
    let topics: Topic[];
    try {
      topics = await this.deps.loadTopics();
    } catch (error) {
      if (error instanceof ConfigError) throw error;
      throw new ConfigError(`Topic configuration unavailable: ${errorMessage(error)}`, { cause: error });
    }

    return options.maxTopics !== undefined
      ? selectTopicsForRun(topics, options.maxTopics, options.rotation ?? 0)
      : topics;
  }

  /**
   * Collect -> Match -> Persist for one pair. Only fatal errors escape.
   */
  private async processPair({ topic, collector }: WorkItem, state: RunState, runLog: Logger): Promise<void> {
    const { summary } = state;
    const log = runLog.child({ topic: topic.id, collector: collector.name });
    let count = 0;

    try {
      for await (const raw of collector.collect(topic, state.ctx)) {
        count++;
        summary.recordCollected(collector.name);
        await this.persist(raw, state, log);
      }
    } catch (error) {
      if (isFatal(error)) throw error;

      if (error instanceof RateLimited) {
        summary.recordFailure(collector.name, 'rate_limited');
        log.warn('Rate limited, pair skipped until next run', { retryAfterMs: error.retryAfterMs });
        return;
      }

      const failure =
        error instanceof CollectorFailure ? error : new CollectorFailure(collector.name, topic.id, error);
      summary.recordFailure(collector.name, 'collector');
      log.warn('Collector failed, pair skipped', { error: failure.message });
      return;
    }

    log.debug('Pair completed', { collected: count });
  }

  private async persist(raw: RawCandidateEvent, state: RunState, log: Logger): Promise<void> {
    const { summary, upserted } = state;
    let matched: Set<string>;
    try {
      matched = this.matcher.classify(raw, state.topics);
    } catch (error) {
      if (!(error instanceof MatchError)) throw error;
      summary.recordFailure(raw.source, 'match');
      log.warn('Dropping malformed event', { error: error.message });
      return;
    }

    // Claimed before any await so concurrent pairs cannot both take a fingerprint
    const fresh = [...matched].filter(topicId => {
      const key = fingerprint({ source: raw.source, externalId: raw.externalId, topicId });
      if (upserted.has(key)) return false;
      upserted.add(key);
      return true;
    });
    summary.recordMatches(raw.source, fresh.length, matched.size - fresh.length);

    for (const topicId of fresh) {
      try {
        const outcome = await this.deps.store.upsert({ ...raw, topicId });
        summary.recordUpsert(raw.source, outcome);
      } catch (error) {
        if (error instanceof StoreUnavailable) throw error;
        throw new StoreUnavailable(`Upsert failed: ${errorMessage(error)}`, {
          cause: error,
          context: { topicId, source: raw.source, externalId: raw.externalId },
        });
      }
    }
  }

  /**
   * Wait for all tasks, or for at most `graceMs` once the run is cancelled.
   */
  private async settle(
    tasks: Promise<void>[],
    signal: AbortSignal,
    graceMs: number,
    log: Logger
  ): Promise<void> {
    const all = Promise.all(tasks).then(() => true);

    const grace = new AbortController();
    const expired = new Promise<boolean>(resolve => {
      const startGrace = () => {
        void sleep(graceMs, grace.signal).then(done => {
          if (done) resolve(false);
        });
      };
      if (signal.aborted) startGrace();
      else signal.addEventListener('abort', startGrace, { once: true });
    });

    const completed = await Promise.race([all, expired]);
    grace.abort();

    if (!completed) {
      log.warn('Grace period elapsed, abandoning in-flight pairs', { graceMs });
    }
  }
}
