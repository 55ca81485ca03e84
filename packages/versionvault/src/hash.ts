/**
 * Content hashing via SHA-256.
 *
 * Object identities are bare digests: 64-char lowercase hex, no algorithm prefix.
 */

import { createHash } from 'node:crypto';

/** Length of a hex-encoded SHA-256 digest */
export const HASH_LENGTH = 64;

/** Hash a byte buffer and return the lowercase hex digest. */
export function hashBytes(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Hash a string as UTF-8. */
export function hashString(input: string): string {
  return createHash('sha256').update(input, 'utf-8').digest('hex');
}

/** Check if a string is a valid object hash. */
export function isValidHash(hash: string): boolean {
  return /^[0-9a-f]{64}$/.test(hash);
}

/** Shorten a hash for display. */
export function shortHash(hash: string, length = 12): string {
  return hash.slice(0, length);
}
