/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - SQL templates for the external schema are configuration, not code.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv (see .env.example).
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - Booleans accept only 'true' / 'false'. z.coerce.boolean() would read the
 *   string 'false' as true.
 * - DATABASE_URL is optional: without it every query reports "unavailable".
 */

import 'dotenv/config';
import { z } from 'zod';

import { createQueryConfiguration } from '../modules/users/user.config';
import type { QueryConfiguration, QueryErrorMode } from '../modules/users/user.types';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((v) => v === 'true');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('sql-user-store'),

  // External user database
  DB_DIALECT: z.string().min(1),
  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),

  // Credentials
  HASH_FUNCTION: z.string().min(1).default('SHA-256'),
  HASH_ADAPTIVE: BooleanFlag,
  ALLOW_USER_DELETE: BooleanFlag,
  QUERY_ERROR_MODE: z.enum(['lenient', 'strict']).default('lenient'),

  // SQL templates (positional placeholders in the dialect's own syntax)
  QUERY_LIST_ALL: z.string().min(1),
  QUERY_COUNT: z.string().min(1),
  QUERY_FIND_BY_ID: z.string().min(1),
  QUERY_FIND_BY_USERNAME: z.string().min(1),
  QUERY_FIND_BY_EMAIL: z.string().min(1),
  QUERY_FIND_BY_SEARCH_TERM: z.string().min(1),
  QUERY_FIND_PASSWORD_HASH: z.string().min(1),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  host: string;

  logLevel: string;
  serviceName: string;

  database: {
    url: string | null;
    poolMax: number;
  };

  queries: QueryConfiguration;
  queryErrorMode: QueryErrorMode;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    host: parsed.HOST,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    database: {
      url: parsed.DATABASE_URL ?? null,
      poolMax: parsed.DB_POOL_MAX,
    },

    queries: createQueryConfiguration({
      dialect: parsed.DB_DIALECT,
      listAll: parsed.QUERY_LIST_ALL,
      count: parsed.QUERY_COUNT,
      findById: parsed.QUERY_FIND_BY_ID,
      findByUsername: parsed.QUERY_FIND_BY_USERNAME,
      findByEmail: parsed.QUERY_FIND_BY_EMAIL,
      findBySearchTerm: parsed.QUERY_FIND_BY_SEARCH_TERM,
      findPasswordHash: parsed.QUERY_FIND_PASSWORD_HASH,
      hashFunction: parsed.HASH_FUNCTION,
      adaptiveHash: parsed.HASH_ADAPTIVE,
      allowDelete: parsed.ALLOW_USER_DELETE,
    }),
    queryErrorMode: parsed.QUERY_ERROR_MODE,
  };
}
