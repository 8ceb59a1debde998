import { FieldValue, Row, Table, field, withDerivedColumn } from './table';

/** Inclusive range of calendar days, both ends `YYYY-MM-DD`. */
export interface DateRange {
  start: string;
  end: string;
}

export const EVENT_DATE_COLUMN = 'date';

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

// Date and time with no zone designator, read as UTC rather than host-local.
const NAIVE_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/** Format a Date as its UTC calendar day. */
export function toIsoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse a raw timestamp field into a UTC calendar day.
 * Numbers are epoch milliseconds. Strings without an offset are taken as UTC.
 * Anything unparsable gives null.
 */
export function parseEventDate(value: FieldValue): string | null {
  let date: Date;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'number') {
    date = new Date(value);
  } else if (typeof value === 'string' && value.trim() !== '') {
    const text = value.trim();
    const naive = NAIVE_TIMESTAMP.exec(text);
    date = new Date(naive ? `${naive[1]}T${naive[2]}Z` : text);
  } else {
    return null;
  }
  return Number.isNaN(date.getTime()) ? null : toIsoDay(date);
}

/** Add the derived event-date column parsed from `sourceColumn`. */
export function withEventDate(table: Table, sourceColumn: string, column = EVENT_DATE_COLUMN): Table {
  return withDerivedColumn(table, column, (row) => parseEventDate(field(row, sourceColumn)));
}

function isoDayOf(row: Row, column: string): string | null {
  const value = field(row, column);
  return typeof value === 'string' && ISO_DAY.test(value) ? value : null;
}

/**
 * Keep rows whose event date lies within the inclusive range. Rows without a
 * usable date are dropped. Without a range the table is returned as is.
 */
export function filterByDate(table: Table, range?: DateRange, column = EVENT_DATE_COLUMN): Table {
  if (!range) return table;
  return {
    columns: table.columns,
    rows: table.rows.filter((row) => {
      const day = isoDayOf(row, column);
      return day !== null && day >= range.start && day <= range.end;
    }),
  };
}

/**
 * Earliest and latest event date present, used to pre-fill the date picker.
 * Falls back to `today` on both ends when no row carries a date.
 */
export function availableDateRange(table: Table, column = EVENT_DATE_COLUMN, today: Date = new Date()): DateRange {
  let start: string | null = null;
  let end: string | null = null;
  for (const row of table.rows) {
    const day = isoDayOf(row, column);
    if (day === null) continue;
    if (start === null || day < start) start = day;
    if (end === null || day > end) end = day;
  }
  if (start === null || end === null) {
    const fallback = toIsoDay(today);
    return { start: fallback, end: fallback };
  }
  return { start, end };
}

/**
 * Build a range from query parameters. Both ends must be valid calendar days,
 * otherwise no filter applies. Reversed ends are swapped.
 */
export function parseDateRange(start?: string, end?: string): DateRange | undefined {
  if (!start || !end) return undefined;
  const from = parseEventDate(start);
  const to = parseEventDate(end);
  // Overflowing days such as 02-30 parse but roll into the next month.
  if (!ISO_DAY.test(start) || !ISO_DAY.test(end) || from !== start || to !== end) {
    return undefined;
  }
  return start <= end ? { start, end } : { start: end, end: start };
}
