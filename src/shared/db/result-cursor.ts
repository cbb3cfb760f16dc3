/**
 * src/shared/db/result-cursor.ts
 *
 * WHY:
 * - Row transformers must not depend on a specific driver's result type.
 * - A forward-only cursor is the smallest capability they need, and an
 *   in-memory cursor makes them testable without a database.
 *
 * RULES:
 * - Column labels are available before the first row is read.
 * - `value()` reads the current row only; before `next()` returns true there is none.
 */

export type ColumnRef = string | number;

export interface ResultCursor {
  columnLabels(): readonly string[];
  /** Advances to the next row. Returns false once the result is exhausted. */
  next(): boolean;
  /** Value of a column on the current row, by label or 0-based position. */
  value(column: ColumnRef): unknown;
}

type Row = Readonly<Record<string, unknown>>;

function toRow(raw: unknown): Row {
  if (typeof raw !== 'object' || raw === null) {
    throw new TypeError(`Expected a row object, got ${typeof raw}`);
  }
  return Object.fromEntries(Object.entries(raw));
}

/**
 * Cursor over already-fetched row objects (the shape Kysely drivers return).
 * When `columns` is omitted the labels are taken from the first row, so an
 * empty result has no labels. Labels matching `hidden` are neither listed nor
 * addressable by position.
 */
export class RowsCursor implements ResultCursor {
  private readonly rows: readonly Row[];
  private readonly labels: readonly string[];
  private index = -1;

  constructor(
    rows: readonly unknown[],
    columns?: readonly string[],
    hidden?: (label: string) => boolean,
  ) {
    this.rows = rows.map(toRow);
    const labels = columns ?? Object.keys(this.rows[0] ?? {});
    this.labels = hidden ? labels.filter((label) => !hidden(label)) : labels;
  }

  columnLabels(): readonly string[] {
    return this.labels;
  }

  next(): boolean {
    if (this.index >= this.rows.length) return false;
    this.index += 1;
    return this.index < this.rows.length;
  }

  value(column: ColumnRef): unknown {
    const row = this.rows[this.index];
    if (!row) {
      throw new RangeError('Cursor is not positioned on a row');
    }

    const label = typeof column === 'number' ? this.labels[column] : column;
    if (label === undefined) {
      throw new RangeError(`Column index out of range: ${column}`);
    }
    return row[label];
  }
}
