/**
 * Tests for run summaries and exit codes
 */

import { describe, it, expect } from 'vitest';
import { RunSummaryBuilder, formatRunSummary } from '../../src/pipeline/summary';
import { EXIT_CODES, exitCodeFor } from '../../src/pipeline/exit-codes';
import { CollectorFailure, ConfigError, RateLimited, StoreUnavailable } from '../../src/lib/errors';

describe('RunSummaryBuilder', () => {
  it('should report success when nothing failed', () => {
    const builder = new RunSummaryBuilder('run-1');
    builder.setTopics(2);
    builder.recordCollected('github');
    builder.recordMatches('github', 2);
    builder.recordUpsert('github', 'inserted');
    builder.recordUpsert('github', 'updated');

    const summary = builder.build();

    expect(summary).toMatchObject({
      runId: 'run-1',
      topics: 2,
      collected: 1,
      matched: 2,
      noMatch: 0,
      inserted: 1,
      updated: 1,
      cancelled: false,
      outcome: 'success',
    });
    expect(summary.sources).toEqual({
      github: { collected: 1, matched: 2, inserted: 1, updated: 1, failures: 0 },
    });
  });

  it('should count failures by kind and mark the run partial', () => {
    const builder = new RunSummaryBuilder('run-2');
    builder.recordFailure('reddit', 'rate_limited');
    builder.recordFailure('hacker_news', 'match');
    builder.recordMatches('hacker_news', 0);

    const summary = builder.build();

    expect(summary.failures).toEqual({ collector: 0, rate_limited: 1, match: 1 });
    expect(summary.noMatch).toBe(1);
    expect(summary.outcome).toBe('partial');
  });

  it('should count repeat matches as duplicates, not as no match', () => {
    const builder = new RunSummaryBuilder('run-5');
    builder.recordMatches('hacker_news', 2);
    builder.recordMatches('hacker_news', 0, 2);

    expect(builder.build()).toMatchObject({ matched: 2, duplicates: 2, noMatch: 0 });
  });

  it('should mark cancelled runs partial', () => {
    const builder = new RunSummaryBuilder('run-3');
    builder.markCancelled();
    expect(builder.build()).toMatchObject({ cancelled: true, outcome: 'partial' });
  });
});

describe('formatRunSummary', () => {
  it('should list counters, failures and sources', () => {
    const builder = new RunSummaryBuilder('run-4');
    builder.setTopics(1);
    builder.recordCollected('hacker_news');
    builder.recordMatches('hacker_news', 1);
    builder.recordUpsert('hacker_news', 'inserted');

    const lines = formatRunSummary(builder.build()).split('\n');

    expect(lines[1]).toBe('TOPIC RADAR - RUN SUMMARY');
    expect(lines).toContain('Run: run-4');
    expect(lines).toContain('Outcome: success');
    expect(lines).toContain('Inserted: 1');
    expect(lines).toContain('Duplicates: 0');
    expect(lines).toContain('  rate_limited: 0');
    expect(lines).toContain('  hacker_news: collected 1, matched 1, inserted 1, updated 0, failures 0');
  });
});

describe('exitCodeFor', () => {
  it('should map fatal errors to their exit codes', () => {
    expect(exitCodeFor(new ConfigError('bad topics'))).toBe(EXIT_CODES.config);
    expect(exitCodeFor(new StoreUnavailable('down'))).toBe(EXIT_CODES.storeUnavailable);
  });

  it('should treat anything else as unexpected', () => {
    expect(exitCodeFor(new Error('bug'))).toBe(1);
    expect(exitCodeFor(new CollectorFailure('github', 'devops', 'boom'))).toBe(1);
    expect(exitCodeFor(new RateLimited('github', 1000))).toBe(1);
  });
});
