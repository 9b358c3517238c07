/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - The result is built ONCE in index.ts and handed to buildDeps(); nothing else
 *   reads process.env for application settings.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string,
 *   so invalid values ('prod', 'staging') are caught at startup by Zod.
 * - jwt.algorithm is limited to the symmetric HMAC family because access and
 *   refresh tokens are signed with shared secrets.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

export const JWT_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
const JwtAlgorithmSchema = z.enum(JWT_ALGORITHMS).default('HS256');

// z.coerce.boolean() turns "false" into true; accept the two literal strings instead.
const BooleanStringSchema = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().default(3000),

    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1),

    // Logging / service identity
    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('screenpass-backend'),

    BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),

    // JWT
    JWT_SECRET_KEY_ACCESS: z.string().min(16),
    JWT_SECRET_KEY_REFRESH: z.string().min(16),
    JWT_SIGNING_ALGORITHM: JwtAlgorithmSchema,
    ACCESS_TOKEN_TTL_MINUTES: z.coerce.number().int().min(1).max(60).default(15),
    LOGIN_TIME_DAYS: z.coerce.number().int().min(1).max(90).default(7),

    // One-time email tokens
    ACTIVATION_TOKEN_TTL_HOURS: z.coerce
      .number()
      .int()
      .min(1)
      .max(24 * 7)
      .default(24),
    PASSWORD_RESET_TOKEN_TTL_HOURS: z.coerce
      .number()
      .int()
      .min(1)
      .max(24 * 7)
      .default(24),

    // Base URL of the web client; email links point here.
    PUBLIC_APP_URL: z.string().url().default('http://localhost:5173'),

    // DEV seed bootstrap (idempotent)
    SEED_ON_START: BooleanStringSchema,
    SEED_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
    SEED_ADMIN_PASSWORD: z.string().min(8).default('Adm1n!Password'),
  })
  .refine((env) => env.JWT_SECRET_KEY_ACCESS !== env.JWT_SECRET_KEY_REFRESH, {
    message: 'JWT_SECRET_KEY_ACCESS and JWT_SECRET_KEY_REFRESH must differ',
    path: ['JWT_SECRET_KEY_REFRESH'],
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type JwtAlgorithm = (typeof JWT_ALGORITHMS)[number];

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  jwt: {
    accessSecret: string;
    refreshSecret: string;
    algorithm: JwtAlgorithm;
    accessTtlMinutes: number;
    refreshTtlDays: number;
  };

  tokens: {
    activationTtlHours: number;
    passwordResetTtlHours: number;
  };

  publicAppUrl: string;

  seed: {
    enabled: boolean;
    adminEmail: string;
    adminPassword: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    jwt: {
      accessSecret: parsed.JWT_SECRET_KEY_ACCESS,
      refreshSecret: parsed.JWT_SECRET_KEY_REFRESH,
      algorithm: parsed.JWT_SIGNING_ALGORITHM,
      accessTtlMinutes: parsed.ACCESS_TOKEN_TTL_MINUTES,
      refreshTtlDays: parsed.LOGIN_TIME_DAYS,
    },

    tokens: {
      activationTtlHours: parsed.ACTIVATION_TOKEN_TTL_HOURS,
      passwordResetTtlHours: parsed.PASSWORD_RESET_TOKEN_TTL_HOURS,
    },

    publicAppUrl: parsed.PUBLIC_APP_URL,

    seed: {
      enabled: parsed.SEED_ON_START,
      adminEmail: parsed.SEED_ADMIN_EMAIL,
      adminPassword: parsed.SEED_ADMIN_PASSWORD,
    },
  };
}
