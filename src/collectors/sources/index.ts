/**
 * Topic Radar — Collector Sources
 */

export { GitHubCollector, type GitHubCollectorOptions, type GitHubSearchClient } from './github';
export { HackerNewsCollector, type HackerNewsCollectorOptions } from './hacker-news';
export { RedditCollector, type RedditCollectorOptions } from './reddit';
