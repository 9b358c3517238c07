/**
 * backend/src/shared/security/password-hasher.ts
 *
 * Flows depend on this interface; bcrypt lives behind it (bcrypt-password-hasher.ts).
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hashed: string): Promise<boolean>;
}
