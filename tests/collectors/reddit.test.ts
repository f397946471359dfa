/**
 * Tests for the Reddit collector
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RedditCollector, toRawEvent, type RedditPost } from '../../src/collectors/sources/reddit';
import { RequestCache } from '../../src/cache';
import type { RawCandidateEvent, Topic } from '../../src/types';

const mockFetch = vi.fn();
global.fetch = mockFetch;

function post(overrides: Partial<RedditPost> = {}): RedditPost {
  return {
    name: 't3_abc',
    title: 'Rust in production',
    selftext: '  We moved our ingest service  ',
    permalink: '/r/rust/comments/abc/rust_in_production/',
    url: 'https://example.com/post',
    subreddit: 'rust',
    ups: 88,
    num_comments: 12,
    created_utc: 1_740_830_400,
    over_18: false,
    ...overrides,
  };
}

async function drain(events: AsyncIterable<RawCandidateEvent>): Promise<RawCandidateEvent[]> {
  const out: RawCandidateEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

const rust: Topic = {
  id: 'rust',
  keywords: [{ term: 'rust', mode: 'word' }],
  metadata: {},
};

describe('RedditCollector', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should map a post to a raw event', () => {
    expect(toRawEvent(post())).toEqual({
      source: 'reddit',
      externalId: 't3_abc',
      title: 'Rust in production',
      description: 'We moved our ingest service',
      url: 'https://www.reddit.com/r/rust/comments/abc/rust_in_production/',
      publishedAt: '2025-03-01T12:00:00.000Z',
      score: 88,
      metrics: { upvotes: 88, comments: 12, subreddit: 'rust', linkUrl: 'https://example.com/post' },
    });
  });

  it('should fall back to score when ups is missing', () => {
    expect(toRawEvent(post({ ups: undefined, score: 5 })).score).toBe(5);
  });

  it('should send a User-Agent and keep recent safe posts only', async () => {
    const nowSeconds = Math.floor(Date.now() / 1000);
    mockFetch.mockResolvedValue({
      ok: true,
      status: 200,
      json: async () => ({
        data: {
          children: [
            { data: post({ created_utc: nowSeconds - 3600 }) },
            { data: post({ name: 't3_nsfw', created_utc: nowSeconds - 3600, over_18: true }) },
            { data: post({ name: 't3_old', created_utc: nowSeconds - 30 * 24 * 3600 }) },
          ],
        },
      }),
    });

    const collector = new RedditCollector({ userAgent: 'topic-radar-test/1.0' });
    const events = await drain(collector.collect(rust, { cache: new RequestCache() }));

    expect(events.map(e => e.externalId)).toEqual(['t3_abc']);
    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(String(url)).toContain('q=rust');
    expect(String(url)).toContain('sort=new');
    expect(init.headers['User-Agent']).toBe('topic-radar-test/1.0');
  });
});
