/**
 * backend/src/shared/security/token.ts
 *
 * One-time email tokens (activation, password reset).
 *
 * - 32 random bytes, base64url (safe in query strings, no padding).
 * - Sent to the user once; only tokenHasher.hash(raw) is persisted.
 */

import { randomBytes } from 'node:crypto';

export const SECURE_TOKEN_BYTES = 32;

export function generateSecureToken(bytes: number = SECURE_TOKEN_BYTES): string {
  return randomBytes(bytes).toString('base64url');
}

export function addHours(from: Date, hours: number): Date {
  return new Date(from.getTime() + hours * 60 * 60 * 1000);
}

export function addDays(from: Date, days: number): Date {
  return addHours(from, days * 24);
}
