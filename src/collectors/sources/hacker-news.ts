/**
 * Topic Radar — Hacker News Collector
 *
 * Searches recent stories through the Algolia HN Search API.
 * Self posts link to their discussion page.
 */

import { z } from 'zod';
import { Collector, type CollectContext, type CollectorOptions } from '../base';
import type { LimitPolicy } from '../../cache';
import type { CollectorSource, KeywordRule, RawCandidateEvent, Topic } from '../../types';

const HN_SEARCH_URL = 'https://hn.algolia.com/api/v1/search_by_date';
const HN_ITEM_URL = 'https://news.ycombinator.com/item?id=';

const HNHitSchema = z.object({
  objectID: z.string(),
  title: z.string().nullable().optional(),
  url: z.string().nullable().optional(),
  story_text: z.string().nullable().optional(),
  points: z.number().nullable().optional(),
  num_comments: z.number().nullable().optional(),
  author: z.string().nullable().optional(),
  created_at: z.string(),
});

export const HNSearchSchema = z.object({
  hits: z.array(HNHitSchema),
});

export type HNHit = z.infer<typeof HNHitSchema>;

export interface HackerNewsCollectorOptions extends CollectorOptions {
  daysLimit?: number;
  maxStories?: number;
}

/**
 * Strip tags and entities from HN's HTML story text.
 */
export function stripHtml(text: string): string {
  return text
    .replace(/<[^>]+>/g, ' ')
    .replace(/&[^;\s]+;/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function isHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

export function toRawEvent(hit: HNHit): RawCandidateEvent | null {
  if (!hit.title) return null;

  const url = hit.url && isHttpUrl(hit.url) ? hit.url : `${HN_ITEM_URL}${hit.objectID}`;
  const text = hit.story_text ? stripHtml(hit.story_text) : '';

  return {
    source: 'hacker_news',
    externalId: hit.objectID,
    title: hit.title,
    description: text || undefined,
    url,
    publishedAt: new Date(hit.created_at).toISOString(),
    score: hit.points ?? 0,
    metrics: {
      points: hit.points ?? 0,
      comments: hit.num_comments ?? 0,
      author: hit.author ?? null,
      discussionUrl: `${HN_ITEM_URL}${hit.objectID}`,
    },
  };
}

export class HackerNewsCollector extends Collector {
  readonly name: CollectorSource = 'hacker_news';
  readonly limitPolicy: LimitPolicy = {
    maxCalls: 60,
    windowMs: 60_000,
    maxWaitMs: 65_000,
  };

  private readonly daysLimit: number;
  private readonly maxStories: number;

  constructor(options: HackerNewsCollectorOptions = {}) {
    super(options);
    this.daysLimit = options.daysLimit ?? 7;
    this.maxStories = options.maxStories ?? 50;
  }

  protected async searchKeyword(
    keyword: KeywordRule,
    topic: Topic,
    ctx: CollectContext
  ): Promise<RawCandidateEvent[]> {
    const result = await this.request(
      ctx,
      topic,
      { query: keyword.term, days: this.daysLimit, hits: this.maxStories },
      () => {
        const cutoff = Math.floor(Date.now() / 1000) - this.daysLimit * 24 * 60 * 60;
        const params = new URLSearchParams({
          query: keyword.term,
          tags: 'story',
          numericFilters: `created_at_i>${cutoff}`,
          hitsPerPage: String(this.maxStories),
        });
        return this.getJson(`${HN_SEARCH_URL}?${params.toString()}`, {}, ctx.signal);
      },
      payload => HNSearchSchema.parse(payload)
    );

    return result.hits
      .map(toRawEvent)
      .filter((e): e is RawCandidateEvent => e !== null);
  }
}
