// Uniform row/column view over a batch of sparse source records.

export type FieldValue = string | number | boolean | Date | string[] | null;

/** One fetched document. `id` is the stringified document key. */
export interface SourceRecord {
  id: string;
  [field: string]: FieldValue;
}

export type Row = Readonly<Record<string, FieldValue>>;

export interface Table {
  columns: string[];
  rows: Row[];
}

/**
 * Build a table whose columns are the union of all fields seen across the
 * batch (first-seen order). Records missing a column get `null` there.
 * An empty batch yields zero rows and `defaultColumns`.
 */
export function load(records: readonly SourceRecord[], defaultColumns: readonly string[] = []): Table {
  if (records.length === 0) {
    return { columns: [...defaultColumns], rows: [] };
  }

  const seen = new Set<string>();
  const columns: string[] = [];
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const rows = records.map((record) => {
    const row: Record<string, FieldValue> = {};
    for (const column of columns) {
      row[column] = record[column] ?? null;
    }
    return row;
  });

  return { columns, rows };
}

/** Read a field, treating absent columns as null. */
export function field(row: Row, column: string): FieldValue {
  return row[column] ?? null;
}

/** Return a copy of the table with `column` computed from each row. */
export function withDerivedColumn(table: Table, column: string, derive: (row: Row) => FieldValue): Table {
  const columns = table.columns.includes(column) ? [...table.columns] : [...table.columns, column];
  return {
    columns,
    rows: table.rows.map((row) => ({ ...row, [column]: derive(row) })),
  };
}

/** Coerce a field to a finite number, or null when it is not numeric. */
export function toNumber(value: FieldValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Key used when grouping by a column. Lists and nulls have no key and are
 * left out of groupings.
 */
export function categoryKey(value: FieldValue): string | null {
  if (value === null || Array.isArray(value)) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === 'number' && Number.isNaN(value)) return null;
  return String(value);
}
