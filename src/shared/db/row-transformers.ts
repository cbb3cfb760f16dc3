/**
 * src/shared/db/row-transformers.ts
 *
 * WHY:
 * - Every configured query ends in one of four shapes: a list of records or a
 *   single scalar. Keeping them as small pure functions over ResultCursor
 *   lets the executor stay generic.
 *
 * RULES:
 * - Scalar readers look at the first column of the first row only.
 * - "No row" and SQL NULL are `undefined`, never 0 / false / ''.
 * - SQL NULL columns are omitted from records.
 * - Integers outside the safe range are unconvertible.
 * - Unconvertible values throw QUERY_FAILED (the executor reports it as a failed outcome).
 */

import { AppError } from '../http/errors';
import type { ResultCursor } from './result-cursor';

export type RowTransformer<T> = (cursor: ResultCursor) => T;

export type UserRecord = Readonly<Record<string, string>>;

/** String form of a column value, or undefined for SQL NULL. */
export function columnToString(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf8');
  return JSON.stringify(value);
}

function unreadable(kind: string, value: unknown): AppError {
  return AppError.queryFailed(`Cannot read column as ${kind}`, { valueType: typeof value });
}

export const toRecordList: RowTransformer<UserRecord[]> = (cursor) => {
  const labels = cursor.columnLabels();
  const records: UserRecord[] = [];

  while (cursor.next()) {
    const record: Record<string, string> = {};
    for (const label of labels) {
      const text = columnToString(cursor.value(label));
      if (text !== undefined) record[label] = text;
    }
    records.push(record);
  }

  return records;
};

export const toInt: RowTransformer<number | undefined> = (cursor) => {
  if (!cursor.next()) return undefined;
  const value = cursor.value(0);

  if (value === null || value === undefined) return undefined;

  const parsed = parseInteger(value);
  if (parsed === undefined || !Number.isSafeInteger(parsed)) throw unreadable('integer', value);
  return parsed;
};

function parseInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : undefined;
  }
  // pg returns COUNT(*) (int8) and numeric columns as strings
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
  return undefined;
}

const TRUE_TEXT = new Set(['true', 't', '1', 'yes', 'y']);
const FALSE_TEXT = new Set(['false', 'f', '0', 'no', 'n']);

export const toBoolean: RowTransformer<boolean | undefined> = (cursor) => {
  if (!cursor.next()) return undefined;
  const value = cursor.value(0);

  if (value === null || value === undefined) return undefined;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'bigint') return value !== 0n;
  if (typeof value === 'string') {
    const text = value.trim().toLowerCase();
    if (TRUE_TEXT.has(text)) return true;
    if (FALSE_TEXT.has(text)) return false;
  }

  throw unreadable('boolean', value);
};

export const toText: RowTransformer<string | undefined> = (cursor) => {
  if (!cursor.next()) return undefined;
  return columnToString(cursor.value(0));
};
