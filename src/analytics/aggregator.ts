/**
 * Aggregation over loaded tables.
 *
 * Every function here is pure and tolerates empty tables and missing
 * columns: a missing column reads as null on every row, and null values are
 * left out of groupings, sums and predicate counts.
 */

import { Table, categoryKey, field, toNumber } from './table';

export interface GroupCount {
  category: string;
  count: number;
}

export type MetricSpec =
  | { kind: 'count' }
  | { kind: 'sum'; column: string }
  | { kind: 'matching'; column: string; values: readonly string[] };

export interface GroupAggRow {
  key: string;
  values: Record<string, number>;
}

export interface CrossTabRow {
  a: string;
  b: string;
  count: number;
}

export function totalCount(table: Table): number {
  return table.rows.length;
}

/** Rows whose value in `column` is exactly one of `values`. */
export function countMatching(table: Table, column: string, values: readonly string[]): number {
  const accepted = new Set(values);
  let count = 0;
  for (const row of table.rows) {
    const value = field(row, column);
    if (typeof value === 'string' && accepted.has(value)) count++;
  }
  return count;
}

/** Sum of the numeric values in `column`; anything non-numeric counts as zero. */
export function sumNumeric(table: Table, column: string): number {
  let sum = 0;
  for (const row of table.rows) {
    sum += toNumber(field(row, column)) ?? 0;
  }
  return sum;
}

/** Rows holding a non-null value in `column`. */
export function countPresent(table: Table, column: string): number {
  return table.rows.filter((row) => field(row, column) !== null).length;
}

/** Number of distinct non-null categories in `column`. */
export function countDistinct(table: Table, column: string): number {
  const keys = new Set<string>();
  for (const row of table.rows) {
    const key = categoryKey(field(row, column));
    if (key !== null) keys.add(key);
  }
  return keys.size;
}

/** Keep only rows with a non-null value in `column`. */
export function wherePresent(table: Table, column: string): Table {
  return {
    columns: table.columns,
    rows: table.rows.filter((row) => field(row, column) !== null),
  };
}

function rankCounts(counts: Map<string, number>, topN?: number): GroupCount[] {
  // Array.prototype.sort is stable, so ties keep first-seen order.
  const ranked = Array.from(counts, ([category, count]) => ({ category, count })).sort(
    (a, b) => b.count - a.count,
  );
  return topN === undefined ? ranked : ranked.slice(0, Math.max(0, topN));
}

/** Rows per distinct value of `column`, largest first. Nulls are excluded. */
export function groupCounts(table: Table, column: string, topN?: number): GroupCount[] {
  const counts = new Map<string, number>();
  for (const row of table.rows) {
    const key = categoryKey(field(row, column));
    if (key === null) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return rankCounts(counts, topN);
}

/** Count every tag across all list values of `column`, largest first. */
export function explodeTagCounts(table: Table, column: string, topN?: number): GroupCount[] {
  const counts = new Map<string, number>();
  for (const row of table.rows) {
    const value = field(row, column);
    if (!Array.isArray(value)) continue;
    for (const tag of value) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }
  return rankCounts(counts, topN);
}

/**
 * Compute several metrics per group in a single pass. Rows with a null group
 * value are excluded. When `sortBy` names a metric, groups are ordered by it
 * descending; otherwise they keep first-seen order.
 */
export function groupAgg(
  table: Table,
  groupColumn: string,
  metrics: Record<string, MetricSpec>,
  sortBy?: string,
): GroupAggRow[] {
  const entries = Object.entries(metrics);
  const accepted = new Map<string, Set<string>>();
  for (const [name, spec] of entries) {
    if (spec.kind === 'matching') accepted.set(name, new Set(spec.values));
  }

  const groups = new Map<string, Record<string, number>>();
  for (const row of table.rows) {
    const key = categoryKey(field(row, groupColumn));
    if (key === null) continue;

    let values = groups.get(key);
    if (!values) {
      values = {};
      for (const [name] of entries) values[name] = 0;
      groups.set(key, values);
    }

    for (const [name, spec] of entries) {
      switch (spec.kind) {
        case 'count':
          values[name] += 1;
          break;
        case 'sum':
          values[name] += toNumber(field(row, spec.column)) ?? 0;
          break;
        case 'matching': {
          const value = field(row, spec.column);
          if (typeof value === 'string' && accepted.get(name)?.has(value)) values[name] += 1;
          break;
        }
      }
    }
  }

  const result = Array.from(groups, ([key, values]) => ({ key, values }));
  if (sortBy !== undefined) {
    result.sort((a, b) => (b.values[sortBy] ?? 0) - (a.values[sortBy] ?? 0));
  }
  return result;
}

/** Occurrences of each observed `(a, b)` pair, in first-seen order. */
export function crossTab(table: Table, columnA: string, columnB: string): CrossTabRow[] {
  const pairs = new Map<string, CrossTabRow>();
  for (const row of table.rows) {
    const a = categoryKey(field(row, columnA));
    const b = categoryKey(field(row, columnB));
    if (a === null || b === null) continue;

    const id = JSON.stringify([a, b]);
    const existing = pairs.get(id);
    if (existing) {
      existing.count++;
    } else {
      pairs.set(id, { a, b, count: 1 });
    }
  }
  return Array.from(pairs.values());
}
