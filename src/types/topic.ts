/**
 * Topic Radar — Topic Types
 *
 * Topics are the technology categories an ingestion run classifies against.
 * They are loaded once per run from the topic file and never mutated.
 */

import { z } from 'zod';

// ============================================================
// KEYWORD RULES
// ============================================================

/**
 * How a keyword is tested against event text.
 * - substring: anywhere in the text ("devops" hits "platform-devops-tools")
 * - word: only between non-alphanumeric boundaries ("go" misses "google")
 */
export const KeywordModeSchema = z.enum(['substring', 'word']);
export type KeywordMode = z.infer<typeof KeywordModeSchema>;

export const KeywordRuleSchema = z.object({
  term: z.string().trim().min(1, 'Keyword term cannot be empty'),
  mode: KeywordModeSchema.default('substring'),
});
export type KeywordRule = z.infer<typeof KeywordRuleSchema>;

/**
 * A keyword may be written as a bare string or as a rule object.
 */
export const KeywordInputSchema = z.union([
  z.string().trim().min(1, 'Keyword cannot be empty'),
  KeywordRuleSchema,
]);
export type KeywordInput = z.input<typeof KeywordInputSchema>;

// ============================================================
// TOPIC FILE FORMATS
// ============================================================

export const TopicMetadataSchema = z.record(z.unknown());
export type TopicMetadata = z.infer<typeof TopicMetadataSchema>;

/**
 * Mapping form: { "<topic id>": { keywords, metadata? } }
 */
export const TopicEntrySchema = z.object({
  keywords: z.array(KeywordInputSchema).min(1, 'Topic needs at least one keyword'),
  metadata: TopicMetadataSchema.optional(),
});

export const TopicMapSchema = z.record(
  z.string().trim().min(1, 'Topic id cannot be empty'),
  TopicEntrySchema
);

/**
 * List form: [{ topic, aliases?, category? }]
 */
export const TopicListEntrySchema = z.object({
  topic: z.string().trim().min(1, 'Topic name cannot be empty'),
  aliases: z.array(z.string().trim().min(1)).default([]),
  category: z.string().optional(),
});

export const TopicListSchema = z.array(TopicListEntrySchema);

// ============================================================
// RESOLVED TOPIC
// ============================================================

export interface Topic {
  /** Unique slug */
  id: string;
  /** Ordered keyword rules */
  keywords: KeywordRule[];
  metadata: TopicMetadata;
}
