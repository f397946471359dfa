/**
 * Topic Radar — List Stored Events
 *
 * Read side of the event store, for checking what a run persisted.
 *
 * Usage:
 *   npm run events -- --topic devops --since 2025-01-01 --min-score 10 --limit 20
 */

import 'dotenv/config';
import { createAdminClient } from '../src/db/client';
import { loadConfig } from '../src/lib/config';
import { errorMessage, logger } from '../src/lib/logger';
import { exitCodeFor } from '../src/pipeline';
import { SupabaseEventStore } from '../src/store';
import type { EventQuery } from '../src/types';

function flag(args: string[], name: string): string | undefined {
  const index = args.indexOf(name);
  return index === -1 ? undefined : args[index + 1];
}

function parseQuery(): EventQuery {
  const args = process.argv.slice(2);
  const minScore = flag(args, '--min-score');
  const limit = flag(args, '--limit');
  return {
    topicId: flag(args, '--topic'),
    since: flag(args, '--since'),
    minScore: minScore === undefined ? undefined : Number(minScore),
    limit: limit === undefined ? 50 : Number(limit),
  };
}

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    const store = new SupabaseEventStore(createAdminClient(config.secrets));
    const events = await store.query(parseQuery());

    for (const event of events) {
      console.log(
        `${event.lastSeenAt}  ${event.topicId.padEnd(16)} ${event.source.padEnd(12)} ${String(event.score).padStart(7)}  ${event.title}`
      );
      console.log(`${' '.repeat(26)}${event.url}`);
    }
    console.log(`\n${events.length} event(s)`);
  } catch (error) {
    logger.error('Listing events failed', { error: errorMessage(error) });
    process.exit(exitCodeFor(error));
  }
}

void main();
