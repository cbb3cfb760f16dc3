/**
 * src/shared/db/query-executor.ts
 *
 * WHY:
 * - One place owns connection lifetime, pagination, parameter binding and
 *   driver-error translation for every configured statement.
 * - Callers get a closed outcome instead of null-or-throw, so "no rows",
 *   "database down" and "statement failed" stay distinguishable.
 *
 * RULES:
 * - One connection per call, released on every path (DataSource contract).
 * - The transform runs inside the connection scope.
 * - Driver and transform failures become `failed`; they never throw.
 * - Pagination/config errors DO throw, whether or not a data source exists.
 * - Helper columns added by a page rewrite never reach the transform.
 * - Never log parameter values (usernames, emails, search terms).
 */

import type { Logger } from '../logger/logger';
import type { DataSourceProvider } from './data-source';
import { formatWithPageable, isPaginationColumn } from './pagination';
import type { Pageable } from './pagination';
import { RowsCursor } from './result-cursor';
import type { RowTransformer } from './row-transformers';

export type QueryOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'unavailable' }
  | { status: 'failed'; error: unknown };

export class QueryExecutor {
  constructor(
    private readonly deps: {
      dataSources: DataSourceProvider;
      dialect: string;
      logger: Logger;
    },
  ) {}

  async execute<T>(
    query: string,
    pageable: Pageable | undefined,
    transform: RowTransformer<T>,
    ...params: unknown[]
  ): Promise<QueryOutcome<T>> {
    const statement = pageable ? formatWithPageable(query, pageable, this.deps.dialect) : query;

    const dataSource = this.deps.dataSources.getDataSource();
    if (!dataSource) {
      this.deps.logger.warn('db.query.unavailable', { flow: 'db.query' });
      return { status: 'unavailable' };
    }

    this.deps.logger.debug('db.query', {
      flow: 'db.query',
      statement,
      paramCount: params.length,
    });

    try {
      const value = await dataSource.withConnection(async (connection) => {
        const result = await connection.executeQuery(statement, params);
        return transform(
          new RowsCursor(result.rows, undefined, pageable ? isPaginationColumn : undefined),
        );
      });
      return { status: 'ok', value };
    } catch (err: unknown) {
      this.deps.logger.error('db.query.failed', {
        flow: 'db.query',
        statement,
        message: err instanceof Error ? err.message : String(err),
        err,
      });
      return { status: 'failed', error: err };
    }
  }
}
