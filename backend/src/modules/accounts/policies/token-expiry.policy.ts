/**
 * Token expiry is judged in UTC instants: a token whose expires_at is at or
 * before `now` is expired.
 */

export function isTokenExpired(expiresAt: Date, now: Date): boolean {
  return expiresAt.getTime() <= now.getTime();
}
