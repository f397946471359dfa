/**
 * Topic Radar — Event Types
 *
 * Raw candidates come from collectors, classified events leave the matcher,
 * stored events live in the event store.
 */

import { z } from 'zod';

// ============================================================
// SOURCES
// ============================================================

export const COLLECTOR_SOURCES = ['github', 'hacker_news', 'reddit', 'product_hunt'] as const;

export type CollectorSource = (typeof COLLECTOR_SOURCES)[number];

export const CollectorSourceSchema = z.enum(COLLECTOR_SOURCES);

// ============================================================
// RAW CANDIDATE
// ============================================================

export type EventMetrics = Record<string, string | number | boolean | null>;

export const EventMetricsSchema = z.record(
  z.union([z.string(), z.number(), z.boolean(), z.null()])
);

export const RawCandidateEventSchema = z.object({
  source: CollectorSourceSchema,
  externalId: z.string().min(1, 'externalId is required'),
  title: z.string().trim().min(1, 'title is required'),
  description: z.string().optional(),
  url: z
    .string()
    .url()
    .refine(u => u.startsWith('http://') || u.startsWith('https://'), 'url must be http(s)'),
  publishedAt: z.string().datetime({ offset: true }),
  score: z.number().finite(),
  metrics: EventMetricsSchema.optional(),
});

/**
 * An item returned by a collector before classification.
 * Exists only within one orchestration pass.
 */
export interface RawCandidateEvent {
  source: CollectorSource;
  /** Provider-native id (repo full name, HN object id, reddit fullname) */
  externalId: string;
  title: string;
  description?: string;
  url: string;
  /** ISO 8601 */
  publishedAt: string;
  /** Stars, points or upvotes */
  score: number;
  metrics?: EventMetrics;
}

/**
 * A raw candidate tagged with one matched topic.
 */
export interface ClassifiedEvent extends RawCandidateEvent {
  topicId: string;
}

// ============================================================
// STORED EVENT
// ============================================================

export interface StoredEvent {
  fingerprint: string;
  source: CollectorSource;
  externalId: string;
  topicId: string;
  title: string;
  url: string;
  publishedAt: string;
  firstSeenAt: string;
  lastSeenAt: string;
  score: number;
  metrics: EventMetrics;
  notifiedAt: string | null;
}

export type UpsertOutcome = 'inserted' | 'updated';

export interface EventQuery {
  topicId?: string;
  /** Only events last seen at or after this instant */
  since?: Date | string;
  minScore?: number;
  limit?: number;
}
