/**
 * Topic Radar — Topic Loading
 *
 * Reads the topic file once per run. Two layouts are accepted:
 *
 *   { "devops": { "keywords": ["docker", { "term": "k8s", "mode": "word" }] } }
 *   [{ "topic": "kafka", "aliases": ["kafka streams"], "category": "data" }]
 *
 * The second is also accepted wrapped as { "topics": [...] }. List entries
 * match as whole words, and ambiguous names are replaced by their
 * unambiguous spellings (see LIST_ANTI_NOISE).
 */

import { readFile } from 'fs/promises';
import type { ZodError } from 'zod';
import {
  KeywordRuleSchema,
  TopicListSchema,
  TopicMapSchema,
  type KeywordInput,
  type KeywordRule,
  type Topic,
} from '../types';
import { ConfigError } from '../lib/errors';
import { logger } from '../lib/logger';

/**
 * List-form topics whose bare name is too common a word to match on.
 * Only these spellings are used for them; their aliases are ignored.
 */
export const LIST_ANTI_NOISE: Readonly<Record<string, readonly string[]>> = {
  rust: ['rustlang'],
  go: ['golang'],
  bun: ['bunjs'],
  ray: ['ray.io'],
  spark: ['apache spark', 'pyspark'],
  kafka: ['apache kafka', 'kafka streams'],
};

function listTerms(id: string, aliases: readonly string[]): string[] {
  if (Object.hasOwn(LIST_ANTI_NOISE, id)) {
    return [...(LIST_ANTI_NOISE[id] ?? [])];
  }
  return [id, ...aliases.map(alias => alias.toLowerCase())];
}

function toRule(input: KeywordInput): KeywordRule {
  return KeywordRuleSchema.parse(typeof input === 'string' ? { term: input } : input);
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fromList(raw: unknown, path: string): Topic[] {
  const parsed = TopicListSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Malformed topic list in ${path}: ${issues.join('; ')}`, {
      context: { path, issues },
    });
  }

  const seen = new Set<string>();
  return parsed.data.map(entry => {
    const id = entry.topic.toLowerCase();
    if (seen.has(id)) {
      throw new ConfigError(`Duplicate topic "${id}" in ${path}`, { context: { path, topic: id } });
    }
    seen.add(id);

    return {
      id,
      keywords: listTerms(id, entry.aliases).map(term => toRule({ term, mode: 'word' })),
      metadata: entry.category ? { category: entry.category } : {},
    };
  });
}

function fromMap(raw: unknown, path: string): Topic[] {
  const parsed = TopicMapSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Malformed topic map in ${path}: ${issues.join('; ')}`, {
      context: { path, issues },
    });
  }

  return Object.entries(parsed.data).map(([id, entry]) => ({
    id,
    keywords: entry.keywords.map(toRule),
    metadata: entry.metadata ?? {},
  }));
}

/**
 * Turn an already-parsed topic document into topics.
 */
export function parseTopics(raw: unknown, path = '<inline>'): Topic[] {
  let topics: Topic[];

  if (Array.isArray(raw)) {
    topics = fromList(raw, path);
  } else if (isRecord(raw) && Array.isArray(raw.topics)) {
    topics = fromList(raw.topics, path);
  } else if (isRecord(raw)) {
    topics = fromMap(raw, path);
  } else {
    throw new ConfigError(`Topic file ${path} must be an object or an array`, { context: { path } });
  }

  if (topics.length === 0) {
    throw new ConfigError(`Topic file ${path} defines no topics`, { context: { path } });
  }

  return topics;
}

/**
 * Load and validate the topic file. Any problem is a ConfigError.
 */
export async function loadTopics(path: string): Promise<Topic[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read topic file ${path}`, { cause: error, context: { path } });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Topic file ${path} is not valid JSON`, { cause: error, context: { path } });
  }

  const topics = parseTopics(raw, path);
  logger.info('Topics loaded', {
    path,
    topics: topics.length,
    keywords: topics.reduce((sum, t) => sum + t.keywords.length, 0),
  });
  return topics;
}

// ============================================================
// RUN SELECTION
// ============================================================

function dayOfYear(date: Date): number {
  const start = Date.UTC(date.getUTCFullYear(), 0, 0);
  return Math.floor((date.getTime() - start) / 86_400_000);
}

export function topicCategory(topic: Topic): string {
  const category = topic.metadata.category;
  return typeof category === 'string' && category.length > 0 ? category : 'general';
}

/**
 * Cap the topics polled in one run.
 *
 * Slots are split evenly across categories; categories are rotated by
 * `rotation`, and topics inside each category by `rotation + day of year`,
 * so consecutive runs cover different topics.
 */
export function selectTopicsForRun(
  topics: readonly Topic[],
  maxTopics: number,
  rotation = 0,
  date: Date = new Date()
): Topic[] {
  if (topics.length <= maxTopics) return [...topics];

  const byCategory = new Map<string, Topic[]>();
  for (const topic of topics) {
    const category = topicCategory(topic);
    const list = byCategory.get(category) ?? [];
    list.push(topic);
    byCategory.set(category, list);
  }

  const names = Array.from(byCategory.keys());
  const perCategory = Math.floor(maxTopics / names.length);
  const remaining = maxTopics % names.length;

  const start = rotation % names.length;
  const rotated = [...names.slice(start), ...names.slice(0, start)];
  const day = dayOfYear(date);

  const selected: Topic[] = [];
  rotated.forEach((name, i) => {
    const list = byCategory.get(name) ?? [];
    const offset = (rotation + day) % list.length;
    const rotatedList = [...list.slice(offset), ...list.slice(0, offset)];
    const extra = i < remaining ? 1 : 0;
    selected.push(...rotatedList.slice(0, perCategory + extra));
  });

  return selected.slice(0, maxTopics);
}
