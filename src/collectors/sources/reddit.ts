/**
 * Topic Radar — Reddit Collector
 *
 * Searches recent link and self posts site-wide via the public search
 * endpoint. Reddit rejects requests without a descriptive User-Agent.
 */

import { z } from 'zod';
import { Collector, type CollectContext, type CollectorOptions } from '../base';
import type { LimitPolicy } from '../../cache';
import type { CollectorSource, KeywordRule, RawCandidateEvent, Topic } from '../../types';

const REDDIT_SEARCH_URL = 'https://www.reddit.com/search.json';

const RedditPostSchema = z.object({
  name: z.string(),
  title: z.string(),
  selftext: z.string().optional(),
  permalink: z.string(),
  url: z.string().optional(),
  subreddit: z.string(),
  ups: z.number().optional(),
  score: z.number().optional(),
  num_comments: z.number().optional(),
  created_utc: z.number(),
  over_18: z.boolean().optional(),
});

export const RedditListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ data: RedditPostSchema })),
  }),
});

export type RedditPost = z.infer<typeof RedditPostSchema>;

export interface RedditCollectorOptions extends CollectorOptions {
  userAgent: string;
  daysLimit?: number;
  maxPosts?: number;
}

export function toRawEvent(post: RedditPost): RawCandidateEvent {
  const score = post.ups ?? post.score ?? 0;
  return {
    source: 'reddit',
    externalId: post.name,
    title: post.title,
    description: post.selftext?.trim() || undefined,
    url: `https://www.reddit.com${post.permalink}`,
    publishedAt: new Date(post.created_utc * 1000).toISOString(),
    score,
    metrics: {
      upvotes: score,
      comments: post.num_comments ?? 0,
      subreddit: post.subreddit,
      linkUrl: post.url ?? null,
    },
  };
}

export class RedditCollector extends Collector {
  readonly name: CollectorSource = 'reddit';
  readonly limitPolicy: LimitPolicy = {
    maxCalls: 10,
    windowMs: 60_000,
    maxWaitMs: 65_000,
    negativeTtlMs: 5 * 60_000,
  };

  private readonly userAgent: string;
  private readonly daysLimit: number;
  private readonly maxPosts: number;

  constructor(options: RedditCollectorOptions) {
    super(options);
    this.userAgent = options.userAgent;
    this.daysLimit = options.daysLimit ?? 7;
    this.maxPosts = options.maxPosts ?? 50;
  }

  protected async searchKeyword(
    keyword: KeywordRule,
    topic: Topic,
    ctx: CollectContext
  ): Promise<RawCandidateEvent[]> {
    const result = await this.request(
      ctx,
      topic,
      { q: keyword.term, limit: this.maxPosts },
      () => {
        const params = new URLSearchParams({
          q: keyword.term,
          sort: 'new',
          t: 'week',
          type: 'link',
          limit: String(this.maxPosts),
        });
        return this.getJson(
          `${REDDIT_SEARCH_URL}?${params.toString()}`,
          { 'User-Agent': this.userAgent },
          ctx.signal
        );
      },
      payload => RedditListingSchema.parse(payload)
    );

    const cutoff = Date.now() / 1000 - this.daysLimit * 24 * 60 * 60;

    return result.data.children
      .map(child => child.data)
      .filter(post => !post.over_18 && post.created_utc >= cutoff)
      .map(toRawEvent);
  }
}
