/**
 * Tests for topic loading and per-run selection
 */

import { describe, it, expect, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadTopics, parseTopics, selectTopicsForRun, topicCategory } from '../../src/matching/topics';
import { TopicMatcher } from '../../src/matching/matcher';
import { ConfigError } from '../../src/lib/errors';
import type { Topic } from '../../src/types';

describe('parseTopics', () => {
  it('should read the mapping form', () => {
    const topics = parseTopics({
      devops: { keywords: ['docker', { term: 'k8s', mode: 'word' }], metadata: { category: 'infra' } },
    });

    expect(topics).toEqual([
      {
        id: 'devops',
        keywords: [
          { term: 'docker', mode: 'substring' },
          { term: 'k8s', mode: 'word' },
        ],
        metadata: { category: 'infra' },
      },
    ]);
  });

  it('should read the list form with name and aliases as whole-word keywords', () => {
    const topics = parseTopics([{ topic: 'Terraform', aliases: ['OpenTofu'], category: 'infra' }]);

    expect(topics).toEqual([
      {
        id: 'terraform',
        keywords: [
          { term: 'terraform', mode: 'word' },
          { term: 'opentofu', mode: 'word' },
        ],
        metadata: { category: 'infra' },
      },
    ]);
  });

  it('should replace ambiguous list topics with their unambiguous spellings', () => {
    const topics = parseTopics([{ topic: 'Kafka', aliases: ['kafka'], category: 'data' }, { topic: 'go' }]);

    expect(topics.map(t => t.keywords)).toEqual([
      [
        { term: 'apache kafka', mode: 'word' },
        { term: 'kafka streams', mode: 'word' },
      ],
      [{ term: 'golang', mode: 'word' }],
    ]);
  });

  it('should keep list topics from matching inside common words', () => {
    const topics = parseTopics([{ topic: 'go' }, { topic: 'rust' }, { topic: 'deno' }]);
    const matcher = new TopicMatcher();
    const event = {
      source: 'hacker_news' as const,
      externalId: '1',
      url: 'https://example.com/post',
      publishedAt: '2025-03-01T10:00:00Z',
      score: 1,
    };

    expect(matcher.classify({ ...event, title: 'Google is going to trust new crates' }, topics).size).toBe(0);
    expect(matcher.classify({ ...event, title: 'Golang 1.24 and Deno 2 released' }, topics)).toEqual(
      new Set(['go', 'deno'])
    );
    expect(matcher.classify({ ...event, title: 'Denormalized tables' }, topics).size).toBe(0);
  });

  it('should read a list wrapped in a topics key', () => {
    const topics = parseTopics({ topics: [{ topic: 'rust' }] });
    expect(topics.map(t => t.id)).toEqual(['rust']);
    expect(topics[0]?.metadata).toEqual({});
  });

  it('should reject duplicate list topics', () => {
    expect(() => parseTopics([{ topic: 'Rust' }, { topic: 'rust' }])).toThrow(ConfigError);
  });

  it('should reject a topic without keywords', () => {
    expect(() => parseTopics({ devops: { keywords: [] } })).toThrow(ConfigError);
  });

  it('should reject an unknown keyword mode', () => {
    expect(() => parseTopics({ devops: { keywords: [{ term: 'docker', mode: 'regex' }] } })).toThrow(ConfigError);
  });

  it('should reject an empty topic file', () => {
    expect(() => parseTopics({})).toThrow('defines no topics');
  });

  it('should reject a scalar document', () => {
    expect(() => parseTopics('devops')).toThrow(ConfigError);
  });
});

describe('loadTopics', () => {
  const dirs: string[] = [];

  async function tempFile(content: string): Promise<string> {
    const dir = await mkdtemp(join(tmpdir(), 'topic-radar-'));
    dirs.push(dir);
    const path = join(dir, 'topics.json');
    await writeFile(path, content, 'utf-8');
    return path;
  }

  afterAll(async () => {
    await Promise.all(dirs.map(dir => rm(dir, { recursive: true, force: true })));
  });

  it('should load topics from a file', async () => {
    const path = await tempFile(JSON.stringify({ devops: { keywords: ['docker', 'kubernetes'] } }));

    const topics = await loadTopics(path);

    expect(topics).toHaveLength(1);
    expect(topics[0]?.keywords.map(k => k.term)).toEqual(['docker', 'kubernetes']);
  });

  it('should raise ConfigError for a missing file', async () => {
    await expect(loadTopics(join(tmpdir(), 'topic-radar-missing', 'nope.json'))).rejects.toBeInstanceOf(ConfigError);
  });

  it('should raise ConfigError for invalid JSON', async () => {
    const path = await tempFile('{ devops: ');
    await expect(loadTopics(path)).rejects.toThrow('is not valid JSON');
  });

  it('should load the bundled topic file', async () => {
    const topics = await loadTopics('config/topics.json');
    expect(topics.map(t => t.id)).toContain('devops');
  });
});

describe('selectTopicsForRun', () => {
  function topic(id: string, category?: string): Topic {
    return {
      id,
      keywords: [{ term: id, mode: 'substring' }],
      metadata: category ? { category } : {},
    };
  }

  const topics = [
    topic('rust', 'languages'),
    topic('go', 'languages'),
    topic('zig', 'languages'),
    topic('kafka', 'data'),
    topic('spark', 'data'),
    topic('misc'),
  ];

  // 2025-01-01 is day 1 of the year
  const newYear = new Date('2025-01-01T06:00:00Z');

  it('should return every topic when under the cap', () => {
    expect(selectTopicsForRun(topics, 10)).toHaveLength(6);
  });

  it('should default the category to general', () => {
    expect(topicCategory(topic('misc'))).toBe('general');
  });

  it('should spread the cap across categories', () => {
    const selected = selectTopicsForRun(topics, 3, 0, newYear);
    expect(selected.map(t => t.id)).toEqual(['go', 'spark', 'misc']);
  });

  it('should rotate categories and topics between runs', () => {
    const selected = selectTopicsForRun(topics, 4, 1, newYear);
    expect(selected.map(t => t.id)).toEqual(['kafka', 'spark', 'misc', 'zig']);
  });
});
