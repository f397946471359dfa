/**
 * Topic Radar — Supabase Client
 *
 * Ingestion writes with the service role key, which bypasses RLS.
 * Credentials come from configuration; this module never reads the environment.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ConfigError, StoreUnavailable } from '../lib/errors';

export interface SupabaseCredentials {
  supabaseUrl?: string;
  supabaseServiceRoleKey?: string;
}

/**
 * Create the service client or fail with ConfigError when unconfigured.
 */
export function createAdminClient(credentials: SupabaseCredentials): SupabaseClient {
  const { supabaseUrl, supabaseServiceRoleKey } = credentials;

  if (!supabaseUrl) {
    throw new ConfigError('Missing SUPABASE_URL environment variable');
  }
  if (!supabaseServiceRoleKey) {
    throw new ConfigError('Missing SUPABASE_SERVICE_ROLE_KEY environment variable');
  }

  return createClient(supabaseUrl, supabaseServiceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

/**
 * Wrap a Supabase/PostgREST error as StoreUnavailable.
 */
export function toStoreUnavailable(operation: string, error: unknown): StoreUnavailable {
  if (error && typeof error === 'object' && 'message' in error) {
    const message = String(error.message);
    const code = 'code' in error && error.code ? String(error.code) : undefined;
    return new StoreUnavailable(
      `Supabase ${operation} failed: ${message}${code ? ` (code: ${code})` : ''}`,
      { cause: error, context: { operation, code } }
    );
  }
  return new StoreUnavailable(`Supabase ${operation} failed`, { cause: error, context: { operation } });
}
