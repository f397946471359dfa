/**
 * Topic Radar — Ingestion Errors
 *
 * Fatal kinds abort a run; recoverable kinds are counted in the run summary.
 *
 *   ConfigError       fatal        topic file or environment unusable
 *   CollectorFailure  recoverable  skip one (topic, provider) pair
 *   RateLimited       recoverable  quota wait exceeded, retry next run
 *   MatchError        recoverable  drop one raw event
 *   StoreUnavailable  fatal        event store cannot be reached
 */

import { errorMessage } from './logger';

export type IngestionErrorKind =
  | 'config'
  | 'collector'
  | 'rate_limited'
  | 'match'
  | 'store_unavailable';

export interface IngestionErrorOptions {
  context?: Record<string, unknown>;
  cause?: unknown;
}

export abstract class IngestionError extends Error {
  abstract readonly kind: IngestionErrorKind;
  abstract readonly fatal: boolean;
  readonly context: Record<string, unknown>;

  constructor(message: string, options: IngestionErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.context = options.context ?? {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      context: this.context,
    };
  }
}

export class ConfigError extends IngestionError {
  override readonly name = 'ConfigError';
  readonly kind = 'config' as const;
  readonly fatal = true;
}

export class CollectorFailure extends IngestionError {
  override readonly name = 'CollectorFailure';
  readonly kind = 'collector' as const;
  readonly fatal = false;
  readonly provider: string;
  readonly topic: string;

  constructor(provider: string, topic: string, cause: unknown) {
    const reason = errorMessage(cause);
    super(`${provider} failed for topic "${topic}": ${reason}`, {
      cause,
      context: { provider, topic },
    });
    this.provider = provider;
    this.topic = topic;
  }
}

export class RateLimited extends IngestionError {
  override readonly name = 'RateLimited';
  readonly kind = 'rate_limited' as const;
  readonly fatal = false;
  readonly provider: string;
  /** Time until the provider's window resets */
  readonly retryAfterMs: number;

  constructor(provider: string, retryAfterMs: number, reason = 'quota wait exceeds limit') {
    super(`${provider} rate limited (${reason}), retry in ${retryAfterMs}ms`, {
      context: { provider, retryAfterMs },
    });
    this.provider = provider;
    this.retryAfterMs = retryAfterMs;
  }
}

export class MatchError extends IngestionError {
  override readonly name = 'MatchError';
  readonly kind = 'match' as const;
  readonly fatal = false;
}

export class StoreUnavailable extends IngestionError {
  override readonly name = 'StoreUnavailable';
  readonly kind = 'store_unavailable' as const;
  readonly fatal = true;
}

export function isIngestionError(error: unknown): error is IngestionError {
  return error instanceof IngestionError;
}

export function isFatal(error: unknown): boolean {
  return isIngestionError(error) ? error.fatal : true;
}
