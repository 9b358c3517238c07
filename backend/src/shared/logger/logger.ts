/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - One structured JSON logger for the whole service.
 * - Stable metadata (service, env) on every line so logs can be filtered per deployment.
 *
 * HOW TO USE:
 * - Import `logger` for process-level events (startup, migrations, redis client errors).
 * - Inside request handlers prefer `withRequestContext(req)`.
 * - Spread `errorFields(err)` into the meta to log a caught error. A nested Error
 *   object serializes as `{}`.
 *
 * RULES:
 * - Never log passwords, raw tokens, or full email addresses.
 *
 * NOTE:
 * - The logger is created at import time, before AppConfig exists, so it is the one
 *   place that reads process.env directly.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'screenpass-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

export const logger = winston.createLogger({
  level,
  format: logFormat,
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

export type Logger = typeof logger;

/** Flat, serializable fields for a caught error. */
export function errorFields(err: unknown): { errMessage: string; stack?: string } {
  if (err instanceof Error) return { errMessage: err.message, stack: err.stack };
  return { errMessage: String(err) };
}
