/**
 * Topic Radar — Event Store
 *
 * Deduplicating persistence for classified events. Upserts for the same
 * fingerprint are serialized in-process; distinct fingerprints proceed
 * concurrently.
 */

import type { ClassifiedEvent, EventQuery, StoredEvent, UpsertOutcome } from '../types';
import { KeyedMutex } from '../lib/concurrency';
import { fingerprint } from './fingerprint';

export interface EventStore {
  /** Insert on first sight, otherwise refresh lastSeenAt and the score snapshot */
  upsert(event: ClassifiedEvent): Promise<UpsertOutcome>;
  /** Events ordered by lastSeenAt, newest first */
  query(query?: EventQuery): Promise<StoredEvent[]>;
  /** Stamp notifiedAt; returns the number of rows changed */
  markNotified(fingerprints: readonly string[], at?: Date): Promise<number>;
  countBySource(): Promise<Record<string, number>>;
  /** Throws StoreUnavailable when the backing store cannot be reached */
  healthCheck(): Promise<void>;
}

export interface EventStoreOptions {
  now?: () => Date;
}

export abstract class BaseEventStore implements EventStore {
  private readonly locks = new KeyedMutex();
  protected readonly now: () => Date;

  constructor(options: EventStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  upsert(event: ClassifiedEvent): Promise<UpsertOutcome> {
    const key = fingerprint(event);
    return this.locks.runExclusive(key, () => this.write(key, event, this.now()));
  }

  /**
   * Atomic insert-or-update of one row. Called with the fingerprint lock held.
   */
  protected abstract write(key: string, event: ClassifiedEvent, seenAt: Date): Promise<UpsertOutcome>;

  abstract query(query?: EventQuery): Promise<StoredEvent[]>;
  abstract markNotified(fingerprints: readonly string[], at?: Date): Promise<number>;
  abstract countBySource(): Promise<Record<string, number>>;
  abstract healthCheck(): Promise<void>;
}

export function sinceTime(since: Date | string | undefined): number | undefined {
  if (since === undefined) return undefined;
  const time = (since instanceof Date ? since : new Date(since)).getTime();
  if (Number.isNaN(time)) {
    throw new RangeError(`Invalid "since" value: ${String(since)}`);
  }
  return time;
}
