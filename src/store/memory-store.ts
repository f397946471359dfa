/**
 * Topic Radar — In-Memory Event Store
 *
 * Process-local store for tests and dry runs.
 */

import type { ClassifiedEvent, EventQuery, StoredEvent, UpsertOutcome } from '../types';
import { BaseEventStore, sinceTime } from './event-store';

export class InMemoryEventStore extends BaseEventStore {
  private readonly rows = new Map<string, StoredEvent>();

  protected async write(key: string, event: ClassifiedEvent, seenAt: Date): Promise<UpsertOutcome> {
    const at = seenAt.toISOString();
    const existing = this.rows.get(key);

    if (existing) {
      this.rows.set(key, {
        ...existing,
        title: event.title,
        url: event.url,
        lastSeenAt: at,
        score: event.score,
        metrics: { ...(event.metrics ?? {}) },
      });
      return 'updated';
    }

    this.rows.set(key, {
      fingerprint: key,
      source: event.source,
      externalId: event.externalId,
      topicId: event.topicId,
      title: event.title,
      url: event.url,
      publishedAt: event.publishedAt,
      firstSeenAt: at,
      lastSeenAt: at,
      score: event.score,
      metrics: { ...(event.metrics ?? {}) },
      notifiedAt: null,
    });
    return 'inserted';
  }

  async query(query: EventQuery = {}): Promise<StoredEvent[]> {
    const since = sinceTime(query.since);

    const rows = Array.from(this.rows.values())
      .filter(row => query.topicId === undefined || row.topicId === query.topicId)
      .filter(row => since === undefined || Date.parse(row.lastSeenAt) >= since)
      .filter(row => query.minScore === undefined || row.score >= query.minScore)
      .sort(
        (a, b) =>
          Date.parse(b.lastSeenAt) - Date.parse(a.lastSeenAt) ||
          b.score - a.score ||
          a.fingerprint.localeCompare(b.fingerprint)
      )
      .map(row => ({ ...row, metrics: { ...row.metrics } }));

    return query.limit === undefined ? rows : rows.slice(0, query.limit);
  }

  async markNotified(fingerprints: readonly string[], at: Date = this.now()): Promise<number> {
    let changed = 0;
    for (const key of new Set(fingerprints)) {
      const row = this.rows.get(key);
      if (row) {
        this.rows.set(key, { ...row, notifiedAt: at.toISOString() });
        changed++;
      }
    }
    return changed;
  }

  async countBySource(): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};
    for (const row of this.rows.values()) {
      counts[row.source] = (counts[row.source] ?? 0) + 1;
    }
    return counts;
  }

  async healthCheck(): Promise<void> {}

  get size(): number {
    return this.rows.size;
  }
}
