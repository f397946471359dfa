/**
 * Topic Radar — Run Summary Types
 */

import type { CollectorSource } from './event';

export type RecoverableFailureKind = 'collector' | 'rate_limited' | 'match';

export interface SourceBreakdown {
  collected: number;
  matched: number;
  inserted: number;
  updated: number;
  failures: number;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  topics: number;
  /** Raw candidates yielded by collectors */
  collected: number;
  /** Topic matches (one raw event matching two topics counts twice) */
  matched: number;
  /** Raw candidates that matched no topic */
  noMatch: number;
  /** Matches skipped because the same fingerprint was already upserted this run */
  duplicates: number;
  inserted: number;
  updated: number;
  failures: Record<RecoverableFailureKind, number>;
  sources: Partial<Record<CollectorSource, SourceBreakdown>>;
  cancelled: boolean;
  outcome: 'success' | 'partial';
}
