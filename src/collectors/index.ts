/**
 * Topic Radar — Collectors Module
 *
 * Source adapters producing raw candidate events.
 */

import type { RadarConfig } from '../lib/config';
import { logger } from '../lib/logger';
import { CollectorRegistry } from './base';
import { GitHubCollector, HackerNewsCollector, RedditCollector } from './sources';

export { Collector, CollectorRegistry, type CollectContext, type CollectorOptions } from './base';
export * from './sources';

/**
 * Build the registry for a run from configuration.
 * GitHub is skipped when no token is configured.
 */
export function createDefaultRegistry(config: RadarConfig): CollectorRegistry {
  const registry = new CollectorRegistry();
  const ttlMs = config.cacheTtlMs;

  if (config.secrets.githubToken) {
    registry.register(
      new GitHubCollector({
        token: config.secrets.githubToken,
        maxPages: config.pageLimit,
        daysLimit: config.lookbackDays,
        ttlMs,
      })
    );
  } else {
    logger.warn('GITHUB_TOKEN not set, GitHub collector disabled');
  }

  registry.register(new HackerNewsCollector({ daysLimit: config.lookbackDays, ttlMs }));
  registry.register(
    new RedditCollector({ userAgent: config.secrets.redditUserAgent, daysLimit: config.lookbackDays, ttlMs })
  );

  return registry;
}
