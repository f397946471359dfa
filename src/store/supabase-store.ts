/**
 * Topic Radar — Supabase Event Store
 *
 * Rows live in `stored_events`. The upsert runs server side in
 * `upsert_stored_event`, a single INSERT ... ON CONFLICT (fingerprint)
 * that reports whether the row was new. See supabase/migrations.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { ClassifiedEvent, EventQuery, StoredEvent, UpsertOutcome } from '../types';
import { CollectorSourceSchema, EventMetricsSchema } from '../types';
import { toStoreUnavailable } from '../db/client';
import { BaseEventStore, sinceTime, type EventStoreOptions } from './event-store';

const TABLE = 'stored_events';

export const StoredEventRowSchema = z.object({
  fingerprint: z.string(),
  source: CollectorSourceSchema,
  external_id: z.string(),
  topic_id: z.string(),
  title: z.string(),
  url: z.string(),
  published_at: z.string(),
  first_seen_at: z.string(),
  last_seen_at: z.string(),
  score: z.coerce.number(),
  metrics: EventMetricsSchema.nullable(),
  notified_at: z.string().nullable(),
});

export type StoredEventRow = z.infer<typeof StoredEventRowSchema>;

export function toStoredEvent(row: StoredEventRow): StoredEvent {
  return {
    fingerprint: row.fingerprint,
    source: row.source,
    externalId: row.external_id,
    topicId: row.topic_id,
    title: row.title,
    url: row.url,
    publishedAt: row.published_at,
    firstSeenAt: row.first_seen_at,
    lastSeenAt: row.last_seen_at,
    score: row.score,
    metrics: row.metrics ?? {},
    notifiedAt: row.notified_at,
  };
}

export function toUpsertArgs(key: string, event: ClassifiedEvent, seenAt: Date): Record<string, unknown> {
  return {
    p_fingerprint: key,
    p_source: event.source,
    p_external_id: event.externalId,
    p_topic_id: event.topicId,
    p_title: event.title,
    p_url: event.url,
    p_published_at: event.publishedAt,
    p_score: event.score,
    p_metrics: event.metrics ?? {},
    p_seen_at: seenAt.toISOString(),
  };
}

const CountRowSchema = z.object({ source: z.string(), total: z.coerce.number() });

export class SupabaseEventStore extends BaseEventStore {
  constructor(
    private readonly client: SupabaseClient,
    options: EventStoreOptions = {}
  ) {
    super(options);
  }

  protected async write(key: string, event: ClassifiedEvent, seenAt: Date): Promise<UpsertOutcome> {
    const { data, error } = await this.client.rpc('upsert_stored_event', toUpsertArgs(key, event, seenAt));
    if (error) throw toStoreUnavailable('upsert', error);

    return z.boolean().parse(data) ? 'inserted' : 'updated';
  }

  async query(query: EventQuery = {}): Promise<StoredEvent[]> {
    let request = this.client
      .from(TABLE)
      .select('*')
      .order('last_seen_at', { ascending: false })
      .order('score', { ascending: false });

    if (query.topicId !== undefined) request = request.eq('topic_id', query.topicId);
    const since = sinceTime(query.since);
    if (since !== undefined) request = request.gte('last_seen_at', new Date(since).toISOString());
    if (query.minScore !== undefined) request = request.gte('score', query.minScore);
    if (query.limit !== undefined) request = request.limit(query.limit);

    const { data, error } = await request;
    if (error) throw toStoreUnavailable('query', error);

    return z.array(StoredEventRowSchema).parse(data ?? []).map(toStoredEvent);
  }

  async markNotified(fingerprints: readonly string[], at: Date = this.now()): Promise<number> {
    if (fingerprints.length === 0) return 0;

    const { data, error } = await this.client
      .from(TABLE)
      .update({ notified_at: at.toISOString() })
      .in('fingerprint', [...new Set(fingerprints)])
      .select('fingerprint');

    if (error) throw toStoreUnavailable('markNotified', error);
    return data?.length ?? 0;
  }

  async countBySource(): Promise<Record<string, number>> {
    const { data, error } = await this.client.rpc('stored_event_counts');
    if (error) throw toStoreUnavailable('countBySource', error);

    const counts: Record<string, number> = {};
    for (const row of z.array(CountRowSchema).parse(data ?? [])) {
      counts[row.source] = row.total;
    }
    return counts;
  }

  async healthCheck(): Promise<void> {
    const { error } = await this.client
      .from(TABLE)
      .select('fingerprint', { count: 'exact', head: true });

    if (error) throw toStoreUnavailable('healthCheck', error);
  }
}
