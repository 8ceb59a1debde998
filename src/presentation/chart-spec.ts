import { CrossTabRow, GroupCount } from '../analytics/aggregator';
import { FieldValue, Row, field } from '../analytics/table';

export type ChartKind = 'bar' | 'pie' | 'funnel' | 'grouped-bar';

export type ColorScale = 'Blues' | 'Greens' | 'Oranges';

export type ChartRow = Record<string, string | number>;

/** Which columns of the chart rows feed which visual channel. */
export interface ChartEncoding {
  category: string;
  value: string;
  color?: string;
}

export interface ChartOptions {
  title: string;
  colorScale?: ColorScale;
  tickAngle?: number;
}

/** Declarative chart description, rendered by the browser-side charting library. */
export interface ChartSpec {
  kind: ChartKind;
  title: string;
  encoding: ChartEncoding;
  rows: ChartRow[];
  colorScale?: ColorScale;
  tickAngle?: number;
}

export interface DisplayColumn {
  key: string;
  label: string;
}

export interface DisplayTable {
  header: string[];
  rows: string[][];
}

export function toChartSpec(
  kind: ChartKind,
  rows: readonly ChartRow[],
  encoding: ChartEncoding,
  options: ChartOptions,
): ChartSpec {
  const spec: ChartSpec = { kind, title: options.title, encoding, rows: [...rows] };
  if (options.colorScale) spec.colorScale = options.colorScale;
  if (options.tickAngle !== undefined) spec.tickAngle = options.tickAngle;
  return spec;
}

/** Reshape ranked counts into chart rows with display column names. */
export function countsToRows(counts: readonly GroupCount[], categoryLabel: string, valueLabel: string): ChartRow[] {
  return counts.map((c) => ({ [categoryLabel]: c.category, [valueLabel]: c.count }));
}

export function crossTabToRows(
  pairs: readonly CrossTabRow[],
  labels: { a: string; b: string; count: string },
): ChartRow[] {
  return pairs.map((p) => ({ [labels.a]: p.a, [labels.b]: p.b, [labels.count]: p.count }));
}

export function displayValue(value: FieldValue): string {
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.join(', ');
  return String(value);
}

/** First `rowLimit` rows as text cells, in the given order. */
export function toDisplayTable(rows: readonly Row[], columns: readonly DisplayColumn[], rowLimit: number): DisplayTable {
  return {
    header: columns.map((c) => c.label),
    rows: rows.slice(0, Math.max(0, rowLimit)).map((row) => columns.map((c) => displayValue(field(row, c.key)))),
  };
}
