/**
 * src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for the external user store.
 * - Each function runs one configured statement and returns the raw QueryOutcome.
 *
 * RULES:
 * - No AppError for driver failures (the facade decides what a failure means).
 * - Search terms are bound as parameters, wrapped in %...% here and only here.
 * - No writes. Ever.
 */

import type { QueryExecutor, QueryOutcome } from '../../../shared/db/query-executor';
import { toInt, toRecordList, toText } from '../../../shared/db/row-transformers';
import type { Pageable, QueryConfiguration, UserRecord } from '../user.types';

export type UserSqlContext = {
  executor: QueryExecutor;
  queries: QueryConfiguration;
};

export function toSearchPattern(search: string): string {
  return `%${search}%`;
}

export function buildSearchCountSql(findBySearchTerm: string): string {
  const inner = findBySearchTerm.replace(/[\s;]+$/, '');
  return `SELECT COUNT(*) FROM (${inner}) search_count`;
}

export function selectAllUsersSql(
  ctx: UserSqlContext,
  pageable?: Pageable,
): Promise<QueryOutcome<UserRecord[]>> {
  return ctx.executor.execute(ctx.queries.listAll, pageable, toRecordList);
}

export function selectUserCountSql(ctx: UserSqlContext): Promise<QueryOutcome<number | undefined>> {
  return ctx.executor.execute(ctx.queries.count, undefined, toInt);
}

export function selectSearchCountSql(
  ctx: UserSqlContext,
  search: string,
): Promise<QueryOutcome<number | undefined>> {
  return ctx.executor.execute(
    buildSearchCountSql(ctx.queries.findBySearchTerm),
    undefined,
    toInt,
    toSearchPattern(search),
  );
}

export function selectUsersBySearchSql(
  ctx: UserSqlContext,
  search: string,
  pageable?: Pageable,
): Promise<QueryOutcome<UserRecord[]>> {
  return ctx.executor.execute(
    ctx.queries.findBySearchTerm,
    pageable,
    toRecordList,
    toSearchPattern(search),
  );
}

export function selectUserByIdSql(
  ctx: UserSqlContext,
  id: number,
): Promise<QueryOutcome<UserRecord[]>> {
  return ctx.executor.execute(ctx.queries.findById, undefined, toRecordList, id);
}

export function selectUserByUsernameSql(
  ctx: UserSqlContext,
  username: string,
): Promise<QueryOutcome<UserRecord[]>> {
  return ctx.executor.execute(ctx.queries.findByUsername, undefined, toRecordList, username);
}

export function selectUserByEmailSql(
  ctx: UserSqlContext,
  email: string,
): Promise<QueryOutcome<UserRecord[]>> {
  return ctx.executor.execute(ctx.queries.findByEmail, undefined, toRecordList, email);
}

export function selectPasswordHashSql(
  ctx: UserSqlContext,
  username: string,
): Promise<QueryOutcome<string | undefined>> {
  return ctx.executor.execute(ctx.queries.findPasswordHash, undefined, toText, username);
}
