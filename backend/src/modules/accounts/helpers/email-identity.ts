/**
 * backend/src/modules/accounts/helpers/email-identity.ts
 *
 * WHY:
 * - Logs and rate-limit keys must not carry raw email addresses.
 * - Flows log the domain plus a stable hashed key instead.
 */

import type { TokenHasher } from '../../../shared/security/token-hasher';

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}

export function emailIdentity(
  tokenHasher: TokenHasher,
  rawEmail: string,
): { email: string; emailKey: string; emailDomain: string } {
  const email = rawEmail.trim().toLowerCase();
  return { email, emailKey: tokenHasher.hash(email), emailDomain: emailDomain(email) };
}
