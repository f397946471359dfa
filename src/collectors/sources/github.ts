/**
 * Topic Radar — GitHub Collector
 *
 * Searches repositories recently pushed to whose name, description or
 * topics mention a keyword. Requires a token: unauthenticated search
 * is limited to 10 requests a minute.
 */

import { Octokit } from 'octokit';
import { z } from 'zod';
import { Collector, type CollectContext, type CollectorOptions } from '../base';
import type { LimitPolicy } from '../../cache';
import type { CollectorSource, KeywordRule, RawCandidateEvent, Topic } from '../../types';

const GitHubRepoSchema = z.object({
  id: z.number(),
  full_name: z.string(),
  html_url: z.string(),
  description: z.string().nullable(),
  language: z.string().nullable().optional(),
  stargazers_count: z.number(),
  forks_count: z.number().optional(),
  open_issues_count: z.number().optional(),
  topics: z.array(z.string()).optional(),
  created_at: z.string(),
  pushed_at: z.string().nullable().optional(),
});

export const GitHubSearchSchema = z.object({
  total_count: z.number(),
  items: z.array(GitHubRepoSchema),
});

export type GitHubRepo = z.infer<typeof GitHubRepoSchema>;

export type GitHubSearchParams = {
  q: string;
  sort: 'stars';
  order: 'desc';
  per_page: number;
  page: number;
};

/**
 * The part of Octokit the collector uses.
 */
export interface GitHubSearchClient {
  rest: {
    search: {
      repos(params: GitHubSearchParams): Promise<{ data: unknown }>;
    };
  };
}

export interface GitHubCollectorOptions extends CollectorOptions {
  token?: string;
  client?: GitHubSearchClient;
  maxPages?: number;
  perPage?: number;
  /** Only repositories pushed within this many days */
  daysLimit?: number;
}

export function buildSearchQuery(keyword: KeywordRule, since: string): string {
  const term = /\s/.test(keyword.term) ? `"${keyword.term}"` : keyword.term;
  return `${term} in:name,description,topics pushed:>=${since}`;
}

export function toRawEvent(repo: GitHubRepo): RawCandidateEvent {
  const topics = repo.topics?.length ? ` ${repo.topics.join(' ')}` : '';
  return {
    source: 'github',
    externalId: repo.full_name,
    title: repo.full_name,
    description: `${repo.description ?? ''}${topics}`.trim() || undefined,
    url: repo.html_url,
    publishedAt: new Date(repo.pushed_at ?? repo.created_at).toISOString(),
    score: repo.stargazers_count,
    metrics: {
      stars: repo.stargazers_count,
      forks: repo.forks_count ?? 0,
      openIssues: repo.open_issues_count ?? 0,
      language: repo.language ?? null,
      repoId: repo.id,
    },
  };
}

export class GitHubCollector extends Collector {
  readonly name: CollectorSource = 'github';
  readonly limitPolicy: LimitPolicy = {
    maxCalls: 30,
    windowMs: 60_000,
    maxWaitMs: 65_000,
    negativeTtlMs: 5 * 60_000,
  };

  private readonly client: GitHubSearchClient;
  private readonly maxPages: number;
  private readonly perPage: number;
  private readonly daysLimit: number;

  constructor(options: GitHubCollectorOptions = {}) {
    super(options);
    if (!options.client && !options.token) {
      throw new Error('GitHub collector requires GITHUB_TOKEN');
    }
    this.client = options.client ?? new Octokit({ auth: options.token });
    this.maxPages = options.maxPages ?? 2;
    this.perPage = options.perPage ?? 30;
    this.daysLimit = options.daysLimit ?? 7;
  }

  protected async searchKeyword(
    keyword: KeywordRule,
    topic: Topic,
    ctx: CollectContext
  ): Promise<RawCandidateEvent[]> {
    const since = this.sinceDate();
    const q = buildSearchQuery(keyword, since);
    const events: RawCandidateEvent[] = [];

    for (let page = 1; page <= this.maxPages; page++) {
      if (ctx.signal?.aborted) break;

      const result = await this.request(
        ctx,
        topic,
        { q, page, perPage: this.perPage },
        async () => {
          const res = await this.client.rest.search.repos({
            q,
            sort: 'stars',
            order: 'desc',
            per_page: this.perPage,
            page,
          });
          return res.data;
        },
        payload => GitHubSearchSchema.parse(payload)
      );

      events.push(...result.items.map(toRawEvent));

      // Last page reached
      if (result.items.length < this.perPage || page * this.perPage >= result.total_count) break;
    }

    return events;
  }

  private sinceDate(): string {
    const date = new Date();
    date.setUTCDate(date.getUTCDate() - this.daysLimit);
    return date.toISOString().slice(0, 10);
  }
}
