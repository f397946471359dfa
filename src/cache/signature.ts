/**
 * Topic Radar — Request Signatures
 *
 * A signature identifies one outbound request: provider, topic and the
 * query parameters that shape the response.
 */

import { createHash } from 'crypto';

export type SignatureParams = Record<string, string | number | boolean | undefined>;

export interface RequestSignature {
  provider: string;
  topic: string;
  params?: SignatureParams;
}

/**
 * Canonical form: lower-cased, params sorted by name, undefined params dropped.
 */
export function canonicalSignature(signature: RequestSignature): string {
  const params = Object.entries(signature.params ?? {})
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${String(value)}`)
    .join('&');

  return `${signature.provider}:${signature.topic}:${params}`.toLowerCase();
}

export function signatureKey(signature: RequestSignature): string {
  return createHash('sha256').update(canonicalSignature(signature)).digest('hex');
}
