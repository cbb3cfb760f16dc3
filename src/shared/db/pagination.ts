/**
 * src/shared/db/pagination.ts
 *
 * WHY:
 * - Configured SQL templates are written by operators for one engine; paging
 *   them is the only rewrite this service performs.
 * - Each dialect pages differently (trailing LIMIT/OFFSET, ROWNUM sub-select,
 *   OFFSET ... FETCH). Paginators live in a table so adding a dialect is one
 *   entry, not a new branch.
 *
 * RULES:
 * - A rewritten query returns the same rows, in the same order, bounded to
 *   [offset, offset + limit).
 * - Unknown dialects fail loudly. Never return the unbounded query.
 * - offset/limit are validated here and inlined as integers, never as
 *   user-supplied text.
 */

import { AppError } from '../http/errors';

export type Pageable = {
  offset: number;
  limit: number;
};

export const DIALECTS = [
  'postgresql',
  'mysql',
  'mariadb',
  'sqlite',
  'h2',
  'oracle',
  'sqlserver',
  'db2',
] as const;

export type Dialect = (typeof DIALECTS)[number];

type Paginator = (query: string, page: Pageable) => string;

const limitOffset: Paginator = (query, { offset, limit }) =>
  `${query} LIMIT ${limit} OFFSET ${offset}`;

/**
 * Helper column added by the ROWNUM rewrite. It is not part of the configured
 * query's result, so cursors drop it (Oracle reports it upper-cased).
 */
export const PAGE_ROW_NUMBER_COLUMN = 'rownum_';

export function isPaginationColumn(label: string): boolean {
  return label.toLowerCase() === PAGE_ROW_NUMBER_COLUMN;
}

// ROWNUM is assigned before ORDER BY is applied, so the ordered query must be
// wrapped before it is bounded.
const rownum: Paginator = (query, { offset, limit }) =>
  `SELECT * FROM (SELECT page_.*, ROWNUM ${PAGE_ROW_NUMBER_COLUMN} FROM (${query}) page_ WHERE ROWNUM <= ${
    offset + limit
  }) WHERE ${PAGE_ROW_NUMBER_COLUMN} > ${offset}`;

// FETCH NEXT 0 ROWS is rejected by these engines.
const offsetFetch: Paginator = (query, { offset, limit }) =>
  limit === 0
    ? `SELECT * FROM (${query} OFFSET ${offset} ROWS) page_ WHERE 1 = 0`
    : `${query} OFFSET ${offset} ROWS FETCH NEXT ${limit} ROWS ONLY`;

const PAGINATORS = new Map<string, Paginator>([
  ['postgresql', limitOffset],
  ['mysql', limitOffset],
  ['mariadb', limitOffset],
  ['sqlite', limitOffset],
  ['h2', limitOffset],
  ['oracle', rownum],
  ['sqlserver', offsetFetch],
  ['db2', offsetFetch],
]);

const DIALECT_ALIASES = new Map<string, Dialect>([
  ['postgres', 'postgresql'],
  ['pg', 'postgresql'],
  ['mssql', 'sqlserver'],
  ['sql_server', 'sqlserver'],
]);

function isDialect(value: string): value is Dialect {
  return (DIALECTS as readonly string[]).includes(value);
}

/**
 * Normalizes a configured dialect tag (case-insensitive, common aliases).
 * Throws CONFIGURATION_ERROR for anything unknown.
 */
export function parseDialect(value: string): Dialect {
  const normalized = value.trim().toLowerCase();
  const aliased = DIALECT_ALIASES.get(normalized) ?? normalized;
  if (isDialect(aliased)) return aliased;

  throw AppError.configuration(`Unsupported database dialect: ${value}`, {
    supported: [...DIALECTS],
  });
}

export function assertValidPageable(page: Pageable): void {
  const { offset, limit } = page;
  if (!Number.isSafeInteger(offset) || offset < 0) {
    throw AppError.validationError('Page offset must be a non-negative integer', { offset });
  }
  if (!Number.isSafeInteger(limit) || limit < 0) {
    throw AppError.validationError('Page limit must be a non-negative integer', { limit });
  }
}

function stripTrailingTerminators(query: string): string {
  return query.replace(/[\s;]+$/, '');
}

/**
 * Rewrites `query` so it returns only the rows in [offset, offset + limit).
 * `dialect` is usually a Dialect, but hosts may hand over raw configuration.
 */
export function formatWithPageable(query: string, page: Pageable, dialect: string): string {
  const paginate = PAGINATORS.get(dialect);
  if (!paginate) {
    throw AppError.configuration(`No pagination syntax for dialect: ${dialect}`, {
      supported: [...PAGINATORS.keys()],
    });
  }

  assertValidPageable(page);
  return paginate(stripTrailingTerminators(query), page);
}
