/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Activation, reset and refresh tokens are bearer secrets; the database only
 *   ever sees their SHA-256 digest.
 * - Lookups hash the presented value and compare digests (unique index on token_hash).
 *
 * HOW TO USE:
 * - const tokenHash = tokenHasher.hash(rawToken)
 */

import { createHash, timingSafeEqual } from 'node:crypto';

export interface TokenHasher {
  hash(rawToken: string): string;
}

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken, 'utf8').digest('hex');
  }
}

/** Constant-time comparison of two digests produced by the same TokenHasher. */
export function tokenHashesMatch(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}
