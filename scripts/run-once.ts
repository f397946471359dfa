/**
 * Topic Radar — Run Once
 *
 * Performs one full ingestion run and exits.
 * Designed to be called by an external cron job or workflow scheduler.
 *
 * Usage:
 *   npm run ingest                              # Run against Supabase
 *   npm run ingest -- --dry-run                 # In-memory store, nothing persisted
 *   npm run ingest -- --topics config/x.json    # Alternate topic file
 *   npm run ingest -- --max-topics 20 --timeout 300000
 *
 * Exit codes: 0 success or partial, 2 configuration error,
 * 3 event store unavailable, 1 anything else.
 *
 * Cron Setup (hourly):
 *   0 * * * * cd /path/to/topic-radar && npm run ingest >> /var/log/topic-radar.log 2>&1
 */

import 'dotenv/config';
import { RequestCache } from '../src/cache';
import { createDefaultRegistry } from '../src/collectors';
import { createAdminClient } from '../src/db/client';
import { loadConfig } from '../src/lib/config';
import { ConfigError, isIngestionError } from '../src/lib/errors';
import { errorMessage, logger } from '../src/lib/logger';
import { loadTopics } from '../src/matching';
import { EXIT_CODES, Orchestrator, exitCodeFor, formatRunSummary } from '../src/pipeline';
import { InMemoryEventStore, SupabaseEventStore, type EventStore } from '../src/store';

interface RunOnceOptions {
  dryRun: boolean;
  topicsFile?: string;
  maxTopics?: number;
  timeoutMs?: number;
}

function positiveIntArg(args: string[], flag: string): number | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = Number(args[index + 1]);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${flag} expects a positive integer`, { context: { flag, value: args[index + 1] } });
  }
  return value;
}

function parseArgs(): RunOnceOptions {
  const args = process.argv.slice(2);
  const topicsIndex = args.indexOf('--topics');
  return {
    dryRun: args.includes('--dry-run'),
    topicsFile: topicsIndex === -1 ? undefined : args[topicsIndex + 1],
    maxTopics: positiveIntArg(args, '--max-topics'),
    timeoutMs: positiveIntArg(args, '--timeout'),
  };
}

async function main(): Promise<void> {
  try {
    const options = parseArgs();
    const config = loadConfig();
    const topicsFile = options.topicsFile ?? config.topicsFile;

    console.log('\n' + '='.repeat(60));
    console.log('TOPIC RADAR INGESTION RUN');
    console.log('='.repeat(60));
    console.log(`Started: ${new Date().toISOString()}`);
    console.log(`Dry Run: ${options.dryRun}`);
    console.log(`Topics: ${topicsFile}`);
    console.log('='.repeat(60) + '\n');

    const store: EventStore = options.dryRun
      ? new InMemoryEventStore()
      : new SupabaseEventStore(createAdminClient(config.secrets));

    const orchestrator = new Orchestrator({
      registry: createDefaultRegistry(config),
      cache: new RequestCache(),
      store,
      loadTopics: () => loadTopics(topicsFile),
    });

    const summary = await orchestrator.run({
      concurrency: config.concurrency,
      maxTopics: options.maxTopics ?? config.maxTopicsPerRun,
      rotation: new Date().getUTCHours(),
      timeoutMs: options.timeoutMs ?? config.runTimeoutMs,
      graceMs: config.runGraceMs,
    });

    console.log('\n' + formatRunSummary(summary) + '\n');

    if (!options.dryRun) {
      logger.info('Stored events by source', await store.countBySource());
    }

    process.exit(EXIT_CODES.success);
  } catch (error) {
    const code = exitCodeFor(error);
    logger.error('Ingestion run failed', {
      error: isIngestionError(error) ? error.toJSON() : { kind: 'unexpected', message: errorMessage(error) },
      exitCode: code,
    });
    console.error('\nIngestion run failed:', errorMessage(error));
    process.exit(code);
  }
}

void main();
