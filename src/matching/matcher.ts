/**
 * Topic Radar — Topic Matcher
 *
 * Deterministic keyword classification, no scoring.
 * A raw candidate matches every topic with at least one keyword rule
 * found in its title or description. Topic order never changes the result.
 */

import type { KeywordRule, RawCandidateEvent, Topic } from '../types';
import { RawCandidateEventSchema } from '../types';
import { MatchError } from '../lib/errors';

type RuleTest = (text: string) => boolean;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the test for one rule. Text handed to the test is already lower-cased.
 */
export function compileRule(rule: KeywordRule): RuleTest {
  const term = rule.term.trim().toLowerCase();

  if (rule.mode === 'word') {
    const pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(term)}(?![a-z0-9])`);
    return text => pattern.test(text);
  }

  return text => text.includes(term);
}

/**
 * Lower-cased title and description joined by a space.
 */
export function searchableText(event: Pick<RawCandidateEvent, 'title' | 'description'>): string {
  return `${event.title} ${event.description ?? ''}`.toLowerCase();
}

export class TopicMatcher {
  private readonly rules = new Map<string, RuleTest>();

  /**
   * Ids of every topic whose keywords occur in the event text.
   * Throws MatchError when the event is malformed.
   */
  classify(event: RawCandidateEvent, topics: readonly Topic[]): Set<string> {
    const parsed = RawCandidateEventSchema.safeParse(event);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'event'}: ${i.message}`);
      throw new MatchError(`Malformed event: ${issues.join('; ')}`, {
        context: { source: event.source, externalId: event.externalId, issues },
      });
    }

    const text = searchableText(parsed.data);
    const matched = new Set<string>();

    for (const topic of topics) {
      if (topic.keywords.some(rule => this.test(rule, text))) {
        matched.add(topic.id);
      }
    }

    return matched;
  }

  private test(rule: KeywordRule, text: string): boolean {
    const key = `${rule.mode}:${rule.term.trim().toLowerCase()}`;
    let test = this.rules.get(key);
    if (!test) {
      test = compileRule(rule);
      this.rules.set(key, test);
    }
    return test(text);
  }
}
