/**
 * src/shared/db/data-source.ts
 *
 * WHY:
 * - The executor needs exactly one capability from a database: run one
 *   statement on a connection that is always given back.
 * - Hosts that own their own driver (Oracle, SQL Server, ...) implement
 *   DataSource directly; the built-in drivers go through Kysely.
 *
 * RULES:
 * - withConnection() releases the connection on every exit path.
 * - Parameters are bound positionally, in order.
 */

import { CompiledQuery } from 'kysely';
import type { Kysely } from 'kysely';

export type RawQueryResult = {
  rows: readonly unknown[];
};

export interface SqlConnection {
  executeQuery(sql: string, params: readonly unknown[]): Promise<RawQueryResult>;
}

export interface DataSource {
  withConnection<T>(work: (connection: SqlConnection) => Promise<T>): Promise<T>;
}

export interface DataSourceProvider {
  /** undefined when no database is configured or reachable. */
  getDataSource(): DataSource | undefined;
}

export type ExternalDb = Kysely<unknown>;

/**
 * DataSource over a Kysely instance. `connection().execute()` reserves one
 * pooled connection for the callback and releases it when the callback settles.
 */
export class KyselyDataSource implements DataSource {
  constructor(private readonly db: ExternalDb) {}

  async withConnection<T>(work: (connection: SqlConnection) => Promise<T>): Promise<T> {
    return this.db.connection().execute(async (conn) =>
      work({
        async executeQuery(sql, params) {
          const result = await conn.executeQuery(CompiledQuery.raw(sql, [...params]));
          return { rows: result.rows };
        },
      }),
    );
  }
}

export function staticDataSourceProvider(dataSource: DataSource | undefined): DataSourceProvider {
  return { getDataSource: () => dataSource };
}
