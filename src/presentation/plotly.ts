import { ChartRow, ChartSpec } from './chart-spec';

export type PlotlyValue = string | number;

export interface PlotlyTrace {
  type: 'bar' | 'pie' | 'funnel';
  name?: string;
  x?: PlotlyValue[];
  y?: PlotlyValue[];
  labels?: PlotlyValue[];
  values?: PlotlyValue[];
  textposition?: 'inside';
  textinfo?: string;
  marker?: { color: PlotlyValue[]; colorscale: string; showscale: boolean };
}

export interface PlotlyLayout {
  title: { text: string };
  paper_bgcolor: string;
  plot_bgcolor?: string;
  barmode?: 'group';
  xaxis?: { tickangle: number };
}

export interface PlotlyFigure {
  data: PlotlyTrace[];
  layout: PlotlyLayout;
}

function column(rows: readonly ChartRow[], key: string): PlotlyValue[] {
  return rows.map((row) => row[key] ?? '');
}

function baseLayout(spec: ChartSpec): PlotlyLayout {
  const layout: PlotlyLayout = { title: { text: spec.title }, paper_bgcolor: 'white' };
  if (spec.kind !== 'pie') layout.plot_bgcolor = 'white';
  if (spec.tickAngle !== undefined) layout.xaxis = { tickangle: spec.tickAngle };
  return layout;
}

function groupedBarTraces(spec: ChartSpec): PlotlyTrace[] {
  const colorKey = spec.encoding.color;
  if (!colorKey) {
    return [{ type: 'bar', x: column(spec.rows, spec.encoding.category), y: column(spec.rows, spec.encoding.value) }];
  }

  const series = new Map<string, ChartRow[]>();
  for (const row of spec.rows) {
    const name = String(row[colorKey] ?? '');
    const bucket = series.get(name);
    if (bucket) {
      bucket.push(row);
    } else {
      series.set(name, [row]);
    }
  }

  return Array.from(series, ([name, rows]) => ({
    type: 'bar' as const,
    name,
    x: column(rows, spec.encoding.category),
    y: column(rows, spec.encoding.value),
  }));
}

/** Translate a chart spec into the figure JSON handed to Plotly in the page. */
export function toPlotlyFigure(spec: ChartSpec): PlotlyFigure {
  const layout = baseLayout(spec);
  if (spec.rows.length === 0) {
    return { data: [], layout };
  }

  const categories = column(spec.rows, spec.encoding.category);
  const values = column(spec.rows, spec.encoding.value);

  switch (spec.kind) {
    case 'pie':
      return {
        data: [{ type: 'pie', labels: categories, values, textposition: 'inside', textinfo: 'percent+label' }],
        layout,
      };
    case 'funnel':
      return { data: [{ type: 'funnel', x: values, y: categories }], layout };
    case 'grouped-bar':
      return { data: groupedBarTraces(spec), layout: { ...layout, barmode: 'group' } };
    case 'bar': {
      const trace: PlotlyTrace = { type: 'bar', x: categories, y: values };
      if (spec.colorScale) {
        trace.marker = { color: values, colorscale: spec.colorScale, showscale: true };
      }
      return { data: [trace], layout };
    }
  }
}
