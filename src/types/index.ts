/**
 * Topic Radar — Type Exports
 */

// Topics
export type {
  KeywordMode,
  KeywordRule,
  KeywordInput,
  TopicMetadata,
  Topic,
} from './topic';
export {
  KeywordModeSchema,
  KeywordRuleSchema,
  KeywordInputSchema,
  TopicMapSchema,
  TopicListSchema,
} from './topic';

// Events
export type {
  CollectorSource,
  EventMetrics,
  RawCandidateEvent,
  ClassifiedEvent,
  StoredEvent,
  UpsertOutcome,
  EventQuery,
} from './event';
export {
  COLLECTOR_SOURCES,
  CollectorSourceSchema,
  EventMetricsSchema,
  RawCandidateEventSchema,
} from './event';

// Runs
export type { RecoverableFailureKind, SourceBreakdown, RunSummary } from './run';
