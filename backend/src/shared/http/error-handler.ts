/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default handler does not know AppError.
 * - Every failure leaves the API in one shape: `{ detail, code }`.
 * - Internal details (meta, stack traces) stay in logs.
 *
 * RESPONSIBILITIES:
 * - AppError -> its status and code.
 * - RateLimitError -> 429.
 * - ZodError -> 400 (safety net for a controller that parsed with .parse()).
 * - Fastify client errors (bad JSON, unsupported media type, body too large) -> their 4xx.
 * - Anything else -> 500 "Internal server error".
 * - Unknown routes -> 404 in the same shape.
 *
 * RULES:
 * - No business logic here.
 * - Meta is logged with sensitive keys redacted and never returned.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';

import { AppError } from './errors';
import type { AppErrorCode } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { withRequestContext } from '../logger/with-context';

export type ErrorResponseBody = {
  detail: string;
  code: AppErrorCode;
};

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'access_token',
  'refreshToken',
  'refresh_token',
  'password',
  'oldPassword',
  'newPassword',
  'hashedPassword',
  'secret',
]);

export function redactMeta(meta: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!meta) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function buildResponse(code: AppErrorCode, detail: string): ErrorResponseBody {
  return { detail, code };
}

function clientErrorStatus(err: Error): number | null {
  if (!('statusCode' in err)) return null;
  const status = err.statusCode;
  if (typeof status !== 'number') return null;
  return status >= 400 && status < 500 ? status : null;
}

function codeForStatus(status: number): AppErrorCode {
  switch (status) {
    case 401:
      return 'UNAUTHORIZED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    case 429:
      return 'RATE_LIMITED';
    default:
      return 'VALIDATION_ERROR';
  }
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const logFn = err.status >= 500 ? log.error : log.warn;
      logFn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Rate limit errors
    if (err instanceof RateLimitError) {
      const limited = AppError.rateLimited();
      log.warn('rate_limit', {
        flow: 'http.error',
        key: err.key,
        limit: err.limit,
        windowSeconds: err.windowSeconds,
      });

      return reply.status(limited.status).send(buildResponse(limited.code, limited.message));
    }

    // 3) Zod errors that escaped a controller
    if (err instanceof ZodError) {
      const detail = err.issues[0]?.message ?? 'Validation error.';
      log.warn('validation_error', { flow: 'http.error', issues: err.issues.length });

      return reply.status(400).send(buildResponse('VALIDATION_ERROR', detail));
    }

    // 4) Fastify's own client errors (malformed JSON, wrong content type, ...)
    const status = clientErrorStatus(err);
    if (status !== null) {
      log.warn('client_error', { flow: 'http.error', status, message: err.message });

      return reply.status(status).send(buildResponse(codeForStatus(status), err.message));
    }

    // 5) Unexpected errors
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).info('route_not_found', { flow: 'http.error', url: req.url });
    return reply.status(404).send(buildResponse('NOT_FOUND', 'Not found.'));
  });
}
