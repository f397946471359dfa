/**
 * Topic Radar — Event Fingerprint
 *
 * Identity of a stored event: which source, which provider item, which
 * topic. Score, title and timestamps change between polls and stay out.
 */

import { createHash } from 'crypto';
import type { ClassifiedEvent } from '../types';

export function fingerprint(event: Pick<ClassifiedEvent, 'source' | 'externalId' | 'topicId'>): string {
  return createHash('sha256')
    .update(JSON.stringify([event.source, event.externalId, event.topicId]))
    .digest('hex');
}
