/**
 * Topic Radar — Process Exit Codes
 *
 * 0 covers partial runs: recoverable failures are reported in the summary.
 */

import { ConfigError, StoreUnavailable } from '../lib/errors';

export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  config: 2,
  storeUnavailable: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.config;
  if (error instanceof StoreUnavailable) return EXIT_CODES.storeUnavailable;
  return EXIT_CODES.unexpected;
}
