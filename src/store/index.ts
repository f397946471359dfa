export { BaseEventStore, type EventStore, type EventStoreOptions } from './event-store';
export { InMemoryEventStore } from './memory-store';
export { SupabaseEventStore, toStoredEvent, type StoredEventRow } from './supabase-store';
export { fingerprint } from './fingerprint';
