/**
 * Topic Radar — Matching Module
 */

export { TopicMatcher, compileRule, searchableText } from './matcher';
export { loadTopics, parseTopics, selectTopicsForRun, topicCategory } from './topics';
