/**
 * backend/src/shared/security/jwt-token-manager.ts
 *
 * WHY:
 * - Issues and validates the two signed credentials of the accounts API:
 *   - access token: short-lived, sent as `Authorization: Bearer ...`
 *   - refresh token: long-lived, persisted (hashed) so it can be revoked
 * - Access and refresh tokens use distinct secrets, so one can never be
 *   presented as the other.
 *
 * CLAIMS:
 * - `user_id` (positive integer), `iat`, `exp`.
 * - Refresh tokens also carry a random `jti`: two logins in the same second
 *   still produce different strings (token_hash is unique in the DB).
 *
 * RULES:
 * - The algorithm is pinned on verify (no `alg` negotiation).
 * - Decode failures surface only as TokenExpiredError / InvalidTokenError.
 */

import { randomUUID } from 'node:crypto';
import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';

import type { JwtAlgorithm } from '../../app/config';
import { InvalidTokenError, TokenExpiredError } from './token-errors';

export type TokenClaims = {
  userId: number;
};

export type DecodedToken = TokenClaims & {
  expiresAt: Date;
};

export type JwtTokenManagerOptions = {
  accessSecret: string;
  refreshSecret: string;
  algorithm: JwtAlgorithm;
  accessTtlMinutes: number;
  refreshTtlDays: number;
  now?: () => Date;
};

type TokenKind = 'access' | 'refresh';

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

export class JwtTokenManager {
  private readonly now: () => Date;

  constructor(private readonly opts: JwtTokenManagerOptions) {
    this.now = opts.now ?? (() => new Date());
  }

  get accessTtlSeconds(): number {
    return this.opts.accessTtlMinutes * 60;
  }

  get refreshTtlSeconds(): number {
    return this.opts.refreshTtlDays * 24 * 60 * 60;
  }

  createAccessToken(claims: TokenClaims): string {
    return this.sign('access', claims, this.accessTtlSeconds);
  }

  createRefreshToken(claims: TokenClaims): string {
    return this.sign('refresh', claims, this.refreshTtlSeconds, randomUUID());
  }

  decodeAccessToken(token: string): DecodedToken {
    return this.verify('access', token);
  }

  decodeRefreshToken(token: string): DecodedToken {
    return this.verify('refresh', token);
  }

  private secretFor(kind: TokenKind): string {
    return kind === 'access' ? this.opts.accessSecret : this.opts.refreshSecret;
  }

  private sign(kind: TokenKind, claims: TokenClaims, ttlSeconds: number, jwtid?: string): string {
    const iat = toEpochSeconds(this.now());

    return jwt.sign({ user_id: claims.userId, iat, exp: iat + ttlSeconds }, this.secretFor(kind), {
      algorithm: this.opts.algorithm,
      ...(jwtid ? { jwtid } : {}),
    });
  }

  private verify(kind: TokenKind, token: string): DecodedToken {
    let payload: string | JwtPayload;

    try {
      payload = jwt.verify(token, this.secretFor(kind), {
        algorithms: [this.opts.algorithm],
        clockTimestamp: toEpochSeconds(this.now()),
      });
    } catch (err: unknown) {
      if (err instanceof jwt.TokenExpiredError) throw new TokenExpiredError();
      if (err instanceof jwt.JsonWebTokenError) throw new InvalidTokenError(err.message);
      throw err;
    }

    if (typeof payload === 'string') {
      throw new InvalidTokenError('payload is not an object');
    }

    const userId: unknown = payload['user_id'];
    if (typeof userId !== 'number' || !Number.isInteger(userId) || userId <= 0) {
      throw new InvalidTokenError('missing user_id claim');
    }

    if (typeof payload.exp !== 'number') {
      throw new InvalidTokenError('missing exp claim');
    }

    return { userId, expiresAt: new Date(payload.exp * 1000) };
  }
}
