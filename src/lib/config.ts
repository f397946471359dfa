/**
 * Topic Radar — Runtime Configuration
 *
 * Reads the environment once at startup. Secrets are handed to collectors
 * and the store from here; nothing else reads process.env.
 */

import { z } from 'zod';
import { ConfigError } from './errors';

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const optionalSecret = z
  .string()
  .optional()
  .transform(v => (v && v.trim().length > 0 ? v.trim() : undefined));

export const EnvSchema = z.object({
  TOPICS_FILE: z.string().min(1).default('config/topics.json'),
  INGEST_CONCURRENCY: intFromEnv(4, 1),
  CACHE_TTL_MS: intFromEnv(3 * 60 * 60 * 1000),
  RUN_TIMEOUT_MS: intFromEnv(10 * 60 * 1000, 1),
  RUN_GRACE_MS: intFromEnv(15_000),
  MAX_TOPICS_PER_RUN: intFromEnv(80, 1),
  PER_SOURCE_PAGE_LIMIT: intFromEnv(2, 1),
  LOOKBACK_DAYS: intFromEnv(7, 1),
  GITHUB_TOKEN: optionalSecret,
  REDDIT_USER_AGENT: z.string().min(1).default('topic-radar/0.1'),
  SUPABASE_URL: optionalSecret,
  SUPABASE_SERVICE_ROLE_KEY: optionalSecret,
});

export interface RadarConfig {
  topicsFile: string;
  concurrency: number;
  cacheTtlMs: number;
  runTimeoutMs: number;
  runGraceMs: number;
  maxTopicsPerRun: number;
  pageLimit: number;
  lookbackDays: number;
  secrets: {
    githubToken?: string;
    redditUserAgent: string;
    supabaseUrl?: string;
    supabaseServiceRoleKey?: string;
  };
}

/**
 * Parse and validate configuration from an environment record.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RadarConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, {
      context: { issues },
    });
  }

  const e = parsed.data;
  return {
    topicsFile: e.TOPICS_FILE,
    concurrency: e.INGEST_CONCURRENCY,
    cacheTtlMs: e.CACHE_TTL_MS,
    runTimeoutMs: e.RUN_TIMEOUT_MS,
    runGraceMs: e.RUN_GRACE_MS,
    maxTopicsPerRun: e.MAX_TOPICS_PER_RUN,
    pageLimit: e.PER_SOURCE_PAGE_LIMIT,
    lookbackDays: e.LOOKBACK_DAYS,
    secrets: {
      githubToken: e.GITHUB_TOKEN,
      redditUserAgent: e.REDDIT_USER_AGENT,
      supabaseUrl: e.SUPABASE_URL,
      supabaseServiceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY,
    },
  };
}
