/**
 * backend/src/shared/security/token-errors.ts
 *
 * Decode failures raised by JwtTokenManager.
 * Messages are user-facing: the refresh endpoint returns them as-is (400).
 */

export class TokenExpiredError extends Error {
  constructor() {
    super('Token has expired.');
    this.name = 'TokenExpiredError';
  }
}

export class InvalidTokenError extends Error {
  constructor(readonly reason: string) {
    super('Invalid token.');
    this.name = 'InvalidTokenError';
  }
}

export type TokenDecodeError = TokenExpiredError | InvalidTokenError;

export function isTokenDecodeError(err: unknown): err is TokenDecodeError {
  return err instanceof TokenExpiredError || err instanceof InvalidTokenError;
}
