/**
 * src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely connection to the external user database.
 * - We do NOT own that schema, so there are no generated table types here:
 *   every statement comes from configuration and runs as raw SQL.
 *
 * HOW TO USE:
 * - createDb('postgresql', 'postgres://...') / createDb('mysql', 'mysql://...')
 * - Other dialects (sqlite, oracle, sqlserver, ...) need a host-supplied
 *   DataSource (see data-source.ts).
 */

import pg from 'pg';
import { createPool } from 'mysql2';
import { Kysely, MysqlDialect, PostgresDialect } from 'kysely';

import { AppError } from '../http/errors';
import type { ExternalDb } from './data-source';
import type { Dialect } from './pagination';

export type PoolOptions = {
  max: number;
};

const DEFAULT_POOL: PoolOptions = { max: 10 };

export function createDb(
  dialect: Dialect,
  databaseUrl: string,
  pool: PoolOptions = DEFAULT_POOL,
): ExternalDb {
  switch (dialect) {
    case 'postgresql':
      return new Kysely<unknown>({
        dialect: new PostgresDialect({
          pool: new pg.Pool({
            connectionString: databaseUrl,
            max: pool.max,
            idleTimeoutMillis: 30_000,
            connectionTimeoutMillis: 10_000,
          }),
        }),
      });

    case 'mysql':
    case 'mariadb':
      return new Kysely<unknown>({
        dialect: new MysqlDialect({
          pool: createPool({
            uri: databaseUrl,
            connectionLimit: pool.max,
            connectTimeout: 10_000,
          }),
        }),
      });

    default:
      throw AppError.configuration(`No built-in driver for dialect: ${dialect}`, { dialect });
  }
}
