import { describe, it, expect } from 'vitest';
import { RowsCursor } from '../../../src/shared/db/result-cursor';
import type { ColumnRef, ResultCursor } from '../../../src/shared/db/result-cursor';
import {
  columnToString,
  toBoolean,
  toInt,
  toRecordList,
  toText,
} from '../../../src/shared/db/row-transformers';
import { AppError } from '../../../src/shared/http/errors';

class CountingCursor implements ResultCursor {
  advances = 0;

  constructor(private readonly inner: ResultCursor) {}

  columnLabels() {
    return this.inner.columnLabels();
  }

  next() {
    this.advances += 1;
    return this.inner.next();
  }

  value(column: ColumnRef) {
    return this.inner.value(column);
  }
}

describe('RowsCursor', () => {
  it('takes labels from the first row and reads by label or position', () => {
    const cursor = new RowsCursor([{ id: 1, name: 'a' }]);
    expect(cursor.columnLabels()).toEqual(['id', 'name']);
    expect(cursor.next()).toBe(true);
    expect(cursor.value('name')).toBe('a');
    expect(cursor.value(0)).toBe(1);
    expect(cursor.next()).toBe(false);
    expect(cursor.next()).toBe(false);
  });

  it('uses explicit labels when given', () => {
    expect(new RowsCursor([], ['id', 'email']).columnLabels()).toEqual(['id', 'email']);
  });

  it('hides labels matched by the hidden predicate, by label and by position', () => {
    const cursor = new RowsCursor([{ ID: 2, ROWNUM_: 2, NAME: 'b' }], undefined, (l) => l === 'ROWNUM_');
    expect(cursor.columnLabels()).toEqual(['ID', 'NAME']);
    expect(cursor.next()).toBe(true);
    expect(cursor.value(1)).toBe('b');
  });

  it('refuses to read before the first row', () => {
    const cursor = new RowsCursor([{ id: 1 }]);
    expect(() => cursor.value('id')).toThrow(RangeError);
  });
});

describe('toRecordList', () => {
  it('builds one string record per row, in order, omitting NULL columns', () => {
    const rows = [
      { id: 1, username: 'alice', last_name: null },
      { id: 2, username: 'bob', last_name: 'Brown' },
    ];

    expect(toRecordList(new RowsCursor(rows))).toEqual([
      { id: '1', username: 'alice' },
      { id: '2', username: 'bob', last_name: 'Brown' },
    ]);
  });

  it('returns an empty list for an empty result', () => {
    expect(toRecordList(new RowsCursor([]))).toEqual([]);
  });
});

describe('columnToString', () => {
  it('stringifies driver values', () => {
    expect(columnToString(42)).toBe('42');
    expect(columnToString(9007199254740993n)).toBe('9007199254740993');
    expect(columnToString(true)).toBe('true');
    expect(columnToString(new Date('2024-03-01T10:00:00.000Z'))).toBe('2024-03-01T10:00:00.000Z');
    expect(columnToString(Buffer.from('hello', 'utf8'))).toBe('hello');
    expect(columnToString({ a: 1 })).toBe('{"a":1}');
    expect(columnToString(null)).toBeUndefined();
  });
});

describe('toInt', () => {
  it('reads the first column of the first row only', () => {
    const cursor = new CountingCursor(new RowsCursor([{ n: 3 }, { n: 4 }]));
    expect(toInt(cursor)).toBe(3);
    expect(cursor.advances).toBe(1);
  });

  it('parses pg-style numeric strings and bigints', () => {
    expect(toInt(new RowsCursor([{ count: '42' }]))).toBe(42);
    expect(toInt(new RowsCursor([{ count: 7n }]))).toBe(7);
  });

  it('returns undefined for no row and for NULL, never 0', () => {
    expect(toInt(new RowsCursor([]))).toBeUndefined();
    expect(toInt(new RowsCursor([{ n: null }]))).toBeUndefined();
  });

  it('throws QUERY_FAILED for values that are not integers', () => {
    expect(() => toInt(new RowsCursor([{ n: 'abc' }]))).toThrow(AppError);
  });

  it('throws QUERY_FAILED for integers beyond the safe range', () => {
    expect(toInt(new RowsCursor([{ n: '9007199254740991' }]))).toBe(Number.MAX_SAFE_INTEGER);
    expect(() => toInt(new RowsCursor([{ n: '9007199254740993' }]))).toThrow(AppError);
    expect(() => toInt(new RowsCursor([{ n: 2n ** 60n }]))).toThrow(AppError);
    expect(() => toInt(new RowsCursor([{ n: 1e20 }]))).toThrow(AppError);
  });
});

describe('toBoolean', () => {
  it('reads booleans in the shapes drivers return', () => {
    expect(toBoolean(new RowsCursor([{ f: true }]))).toBe(true);
    expect(toBoolean(new RowsCursor([{ f: 1 }]))).toBe(true);
    expect(toBoolean(new RowsCursor([{ f: 0 }]))).toBe(false);
    expect(toBoolean(new RowsCursor([{ f: 't' }]))).toBe(true);
    expect(toBoolean(new RowsCursor([{ f: 'FALSE' }]))).toBe(false);
  });

  it('returns undefined for no row, never false', () => {
    expect(toBoolean(new RowsCursor([]))).toBeUndefined();
  });

  it('throws for text it cannot read as a boolean', () => {
    expect(() => toBoolean(new RowsCursor([{ f: 'maybe' }]))).toThrow(AppError);
  });
});

describe('toText', () => {
  it('reads the first column of the first row', () => {
    expect(toText(new RowsCursor([{ h: 'abc' }, { h: 'def' }]))).toBe('abc');
  });

  it('returns undefined for no row and for NULL, never an empty string', () => {
    expect(toText(new RowsCursor([]))).toBeUndefined();
    expect(toText(new RowsCursor([{ h: null }]))).toBeUndefined();
  });
});
