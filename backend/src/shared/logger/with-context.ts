/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Request logs need requestId and the caller's identity to be traceable.
 * - Handlers should not repeat those fields by hand.
 *
 * HOW TO USE:
 * - withRequestContext(req).info('accounts.login.success', { flow: 'accounts.login' })
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';

type LogMeta = Record<string, unknown>;

export function withRequestContext(req: FastifyRequest) {
  const user = req.authContext?.user ?? null;

  const base = {
    requestId: req.requestContext?.requestId,
    ip: req.requestContext?.ip,

    userId: user?.userId ?? null,
    group: user?.group ?? null,
    authFailure: req.authContext?.failure ?? null,
  };

  return {
    info: (msg: string, meta: LogMeta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg: string, meta: LogMeta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg: string, meta: LogMeta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg: string, meta: LogMeta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}
