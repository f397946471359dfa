/**
 * Tests for the Hacker News collector
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { HackerNewsCollector } from '../../src/collectors/sources/hacker-news';
import { stripHtml, toRawEvent } from '../../src/collectors/sources/hacker-news';
import { RequestCache } from '../../src/cache';
import { CollectorFailure } from '../../src/lib/errors';
import type { RawCandidateEvent, Topic } from '../../src/types';

const mockFetch = vi.fn();
global.fetch = mockFetch;

function jsonResponse(body: unknown, status = 200) {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}

async function drain(events: AsyncIterable<RawCandidateEvent>): Promise<RawCandidateEvent[]> {
  const out: RawCandidateEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

const devops: Topic = {
  id: 'devops',
  keywords: [
    { term: 'docker', mode: 'substring' },
    { term: 'kubernetes', mode: 'substring' },
  ],
  metadata: {},
};

const dockerHit = {
  objectID: '1001',
  title: 'Docker tips for small teams',
  url: 'https://example.com/docker',
  points: 40,
  num_comments: 3,
  author: 'alice',
  created_at: '2025-03-01T10:00:00.000Z',
};

const askHit = {
  objectID: '1002',
  title: 'Ask HN: Kubernetes at home?',
  url: null,
  story_text: '<p>Running k8s &amp; friends</p>',
  points: null,
  num_comments: 7,
  author: 'bob',
  created_at: '2025-03-01T11:00:00.000Z',
};

describe('HackerNewsCollector', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  describe('stripHtml', () => {
    it('should remove tags and entities', () => {
      expect(stripHtml('<p>Running k8s &amp; friends</p>')).toBe('Running k8s friends');
    });
  });

  describe('toRawEvent', () => {
    it('should map a link story', () => {
      expect(toRawEvent(dockerHit)).toEqual({
        source: 'hacker_news',
        externalId: '1001',
        title: 'Docker tips for small teams',
        description: undefined,
        url: 'https://example.com/docker',
        publishedAt: '2025-03-01T10:00:00.000Z',
        score: 40,
        metrics: {
          points: 40,
          comments: 3,
          author: 'alice',
          discussionUrl: 'https://news.ycombinator.com/item?id=1001',
        },
      });
    });

    it('should link self posts to their discussion page', () => {
      const event = toRawEvent(askHit);
      expect(event?.url).toBe('https://news.ycombinator.com/item?id=1002');
      expect(event?.description).toBe('Running k8s friends');
      expect(event?.score).toBe(0);
    });

    it('should skip hits without a title', () => {
      expect(toRawEvent({ ...dockerHit, title: null })).toBeNull();
    });
  });

  describe('collect', () => {
    it('should query every keyword and dedupe by id', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ hits: [dockerHit, { ...dockerHit, objectID: '1003', title: null }] }))
        .mockResolvedValueOnce(jsonResponse({ hits: [dockerHit, askHit] }));

      const collector = new HackerNewsCollector();
      const events = await drain(collector.collect(devops, { cache: new RequestCache() }));

      expect(events.map(e => e.externalId)).toEqual(['1001', '1002']);
      expect(mockFetch).toHaveBeenCalledTimes(2);
      const url = String(mockFetch.mock.calls[0]?.[0]);
      expect(url).toContain('query=docker');
      expect(url).toContain('tags=story');
    });

    it('should serve repeated keywords from the cache', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ hits: [dockerHit] }));
      const cache = new RequestCache();
      const collector = new HackerNewsCollector();

      await drain(collector.collect(devops, { cache }));
      await drain(collector.collect(devops, { cache }));

      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('should wrap HTTP errors as CollectorFailure', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, 503));
      const collector = new HackerNewsCollector();

      const error = await drain(collector.collect(devops, { cache: new RequestCache() })).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CollectorFailure);
      if (error instanceof CollectorFailure) {
        expect(error.provider).toBe('hacker_news');
        expect(error.topic).toBe('devops');
        expect(error.message).toContain('hacker_news responded 503');
      }
    });

    it('should wrap unexpected payloads as CollectorFailure', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ results: [] }));
      const collector = new HackerNewsCollector();

      await expect(drain(collector.collect(devops, { cache: new RequestCache() }))).rejects.toBeInstanceOf(
        CollectorFailure
      );
    });

    it('should stop issuing requests once the signal aborts', async () => {
      const controller = new AbortController();
      controller.abort();
      const collector = new HackerNewsCollector();

      const events = await drain(collector.collect(devops, { cache: new RequestCache(), signal: controller.signal }));

      expect(events).toEqual([]);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });
});
