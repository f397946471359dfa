/**
 * Topic Radar — Run Summary
 *
 * Counters accumulated by the orchestrator. The summary is the only
 * observable output of a run besides the store contents, so every
 * swallowed failure is counted here by kind.
 */

import type {
  CollectorSource,
  RecoverableFailureKind,
  RunSummary,
  SourceBreakdown,
  UpsertOutcome,
} from '../types';
import { COLLECTOR_SOURCES } from '../types';

function emptyBreakdown(): SourceBreakdown {
  return { collected: 0, matched: 0, inserted: 0, updated: 0, failures: 0 };
}

export class RunSummaryBuilder {
  private readonly startedAt = new Date();
  private topics = 0;
  private collected = 0;
  private matched = 0;
  private noMatch = 0;
  private duplicates = 0;
  private inserted = 0;
  private updated = 0;
  private cancelled = false;
  private readonly failures: Record<RecoverableFailureKind, number> = {
    collector: 0,
    rate_limited: 0,
    match: 0,
  };
  private readonly sources: Partial<Record<CollectorSource, SourceBreakdown>> = {};

  constructor(readonly runId: string) {}

  setTopics(count: number): void {
    this.topics = count;
  }

  recordCollected(source: CollectorSource): void {
    this.collected++;
    this.source(source).collected++;
  }

  /**
   * `count` fresh matches of one raw event, plus `duplicates` already
   * upserted earlier in the run. Neither means no match.
   */
  recordMatches(source: CollectorSource, count: number, duplicates = 0): void {
    if (count === 0 && duplicates === 0) {
      this.noMatch++;
      return;
    }
    this.duplicates += duplicates;
    if (count > 0) {
      this.matched += count;
      this.source(source).matched += count;
    }
  }

  recordUpsert(source: CollectorSource, outcome: UpsertOutcome): void {
    if (outcome === 'inserted') {
      this.inserted++;
      this.source(source).inserted++;
    } else {
      this.updated++;
      this.source(source).updated++;
    }
  }

  recordFailure(source: CollectorSource, kind: RecoverableFailureKind): void {
    this.failures[kind]++;
    this.source(source).failures++;
  }

  markCancelled(): void {
    this.cancelled = true;
  }

  build(): RunSummary {
    const finishedAt = new Date();
    const failureCount = Object.values(this.failures).reduce((sum, n) => sum + n, 0);

    const sources: Partial<Record<CollectorSource, SourceBreakdown>> = {};
    for (const name of COLLECTOR_SOURCES) {
      const breakdown = this.sources[name];
      if (breakdown) sources[name] = { ...breakdown };
    }

    return {
      runId: this.runId,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - this.startedAt.getTime(),
      topics: this.topics,
      collected: this.collected,
      matched: this.matched,
      noMatch: this.noMatch,
      duplicates: this.duplicates,
      inserted: this.inserted,
      updated: this.updated,
      failures: { ...this.failures },
      sources,
      cancelled: this.cancelled,
      outcome: failureCount > 0 || this.cancelled ? 'partial' : 'success',
    };
  }

  private source(name: CollectorSource): SourceBreakdown {
    let breakdown = this.sources[name];
    if (!breakdown) {
      breakdown = emptyBreakdown();
      this.sources[name] = breakdown;
    }
    return breakdown;
  }
}

/**
 * Plain-text report printed at the end of a run.
 */
export function formatRunSummary(summary: RunSummary): string {
  const rule = '='.repeat(60);
  const lines = [
    rule,
    'TOPIC RADAR - RUN SUMMARY',
    rule,
    `Run: ${summary.runId}`,
    `Started: ${summary.startedAt}`,
    `Finished: ${summary.finishedAt}`,
    `Duration: ${(summary.durationMs / 1000).toFixed(1)}s`,
    `Outcome: ${summary.outcome}${summary.cancelled ? ' (cancelled)' : ''}`,
    `Topics: ${summary.topics}`,
    '',
    `Collected: ${summary.collected}`,
    `Matched: ${summary.matched}`,
    `No match: ${summary.noMatch}`,
    `Duplicates: ${summary.duplicates}`,
    `Inserted: ${summary.inserted}`,
    `Updated: ${summary.updated}`,
    '',
    'FAILURES:',
    `  collector: ${summary.failures.collector}`,
    `  rate_limited: ${summary.failures.rate_limited}`,
    `  match: ${summary.failures.match}`,
  ];

  const sources = COLLECTOR_SOURCES.filter(name => summary.sources[name] !== undefined);
  if (sources.length > 0) {
    lines.push('', 'SOURCES:');
    for (const name of sources) {
      const s = summary.sources[name];
      if (!s) continue;
      lines.push(
        `  ${name}: collected ${s.collected}, matched ${s.matched}, inserted ${s.inserted}, updated ${s.updated}, failures ${s.failures}`
      );
    }
  }

  lines.push(rule);
  return lines.join('\n');
}
