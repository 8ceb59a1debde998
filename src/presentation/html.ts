/**
 * Server-rendered dashboard pages.
 * Charts are emitted as Plotly figure JSON and drawn in the browser.
 */

import { DateRange } from '../analytics/date-range';
import { DisplayTable } from './chart-spec';
import { PlotlyFigure } from './plotly';

export const PLOTLY_CDN = 'https://cdn.plot.ly/plotly-2.35.2.min.js';

export interface KpiCard {
  label: string;
  value: string;
  color: string;
}

export interface ChartPanel {
  id: string;
  figure: PlotlyFigure;
}

export interface TablePanel {
  heading: string;
  table: DisplayTable | null;
  emptyMessage: string;
}

export interface DateFilterForm {
  action: string;
  range: DateRange;
}

export interface DashboardPage {
  title: string;
  subtitle: string;
  kpis: KpiCard[];
  charts: ChartPanel[];
  table: TablePanel;
  filter?: DateFilterForm;
  refreshHref: string;
  refreshSeconds: number;
}

export interface StatusPage {
  title: string;
  cards: { label: string; value: string }[];
  lastUpdate: string;
  refreshSeconds: number;
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** JSON safe to inline inside a `<script>` element. */
export function serializeForScript(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

const DASHBOARD_CSS = `
  body { padding: 20px; font-family: Arial, sans-serif; background-color: #f4f6f7; min-height: 100vh; margin: 0; }
  h1 { text-align: center; color: #1a5276; margin-bottom: 10px; }
  .subtitle { text-align: center; color: #7f8c8d; margin-bottom: 30px; }
  .filter { text-align: center; margin-bottom: 30px; padding: 20px; background: white; border-radius: 10px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); }
  .filter label { font-weight: bold; margin-right: 10px; }
  .kpi-row { display: flex; justify-content: space-around; margin-bottom: 30px; flex-wrap: wrap; gap: 15px; }
  .kpi-card { background: white; padding: 20px 30px; border-radius: 10px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); text-align: center; min-width: 140px; }
  .kpi-card h3 { margin: 0; color: #7f8c8d; }
  .kpi-card h2 { margin: 0; }
  .chart-row { display: flex; justify-content: space-between; margin-bottom: 20px; flex-wrap: wrap; }
  .chart-card { flex: 1; min-width: 400px; margin: 0 10px; background: white; padding: 15px; border-radius: 10px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); }
  .table-card { background: white; padding: 20px; border-radius: 10px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); margin-top: 20px; }
  .table-card h3 { color: #1a5276; margin-bottom: 15px; }
  table { border-collapse: collapse; width: 100%; }
  th { background: #2980b9; color: white; padding: 12px; text-align: left; }
  td { padding: 10px; border-bottom: 1px solid #ecf0f1; }
  tr:hover { background: #f8f9fa; }
  .button { display: inline-block; padding: 10px 20px; font-size: 14px; background-color: #2980b9; color: white; border: none; border-radius: 5px; cursor: pointer; text-decoration: none; }
  .actions { text-align: center; margin-top: 20px; }
`;

const STATUS_CSS = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; padding: 20px; background: #f5f5f5; }
  .header { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; padding: 20px; border-radius: 10px; margin-bottom: 20px; }
  .header h1 { margin: 0; }
  .stats { display: grid; grid-template-columns: repeat(auto-fit, minmax(200px, 1fr)); gap: 15px; margin-bottom: 20px; }
  .stat-card { background: white; padding: 20px; border-radius: 10px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); }
  .stat-card h3 { margin: 0 0 10px 0; color: #666; font-size: 14px; }
  .stat-card .value { font-size: 32px; font-weight: bold; color: #333; }
`;

export function renderTable(table: DisplayTable): string {
  const head = table.header.map((h) => `<th>${escapeHtml(h)}</th>`).join('');
  const body = table.rows
    .map((cells) => `<tr>${cells.map((c) => `<td>${escapeHtml(c)}</td>`).join('')}</tr>`)
    .join('\n');
  return `<table>\n<tr>${head}</tr>\n${body}\n</table>`;
}

function renderKpis(kpis: KpiCard[]): string {
  const cards = kpis
    .map(
      (k) =>
        `<div class="kpi-card"><h3>${escapeHtml(k.label)}</h3><h2 style="color: ${escapeHtml(k.color)}">${escapeHtml(k.value)}</h2></div>`,
    )
    .join('\n');
  return `<div class="kpi-row">\n${cards}\n</div>`;
}

function renderCharts(charts: ChartPanel[]): string {
  const rows: string[] = [];
  for (let i = 0; i < charts.length; i += 2) {
    const cards = charts
      .slice(i, i + 2)
      .map((c) => `<div class="chart-card"><div id="${escapeHtml(c.id)}"></div></div>`)
      .join('\n');
    rows.push(`<div class="chart-row">\n${cards}\n</div>`);
  }
  return rows.join('\n');
}

function renderFilter(filter: DateFilterForm): string {
  return `<form class="filter" method="get" action="${escapeHtml(filter.action)}">
  <label for="start">Date Range:</label>
  <input type="date" id="start" name="start" value="${escapeHtml(filter.range.start)}">
  <input type="date" id="end" name="end" value="${escapeHtml(filter.range.end)}">
  <button class="button" type="submit">Apply Filter</button>
</form>`;
}

function renderPlotScript(charts: ChartPanel[]): string {
  const figures = Object.fromEntries(charts.map((c) => [c.id, c.figure]));
  return `<script>
  const figures = ${serializeForScript(figures)};
  for (const [id, figure] of Object.entries(figures)) {
    Plotly.newPlot(id, figure.data, figure.layout, { responsive: true });
  }
</script>`;
}

export function renderDashboardPage(page: DashboardPage): string {
  const table = page.table.table
    ? renderTable(page.table.table)
    : `<p>${escapeHtml(page.table.emptyMessage)}</p>`;

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <meta http-equiv="refresh" content="${page.refreshSeconds}">
  <title>${escapeHtml(page.title)}</title>
  <script src="${PLOTLY_CDN}"></script>
  <style>${DASHBOARD_CSS}</style>
</head>
<body>
<h1>${escapeHtml(page.title)}</h1>
<p class="subtitle">${escapeHtml(page.subtitle)}</p>
${page.filter ? renderFilter(page.filter) : ''}
${renderKpis(page.kpis)}
${renderCharts(page.charts)}
<div class="table-card">
<h3>${escapeHtml(page.table.heading)}</h3>
${table}
</div>
<div class="actions"><a class="button" href="${escapeHtml(page.refreshHref)}">Refresh Data</a></div>
${renderPlotScript(page.charts)}
</body>
</html>
`;
}

export function renderStatusPage(page: StatusPage): string {
  const cards = page.cards
    .map((c) => `  <div class="stat-card"><h3>${escapeHtml(c.label)}</h3><div class="value">${escapeHtml(c.value)}</div></div>`)
    .join('\n');

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(page.title)}</title>
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <meta http-equiv="refresh" content="${page.refreshSeconds}">
  <style>${STATUS_CSS}</style>
</head>
<body>
<div class="header">
  <h1>${escapeHtml(page.title)}</h1>
  <p>Auto-refreshing every ${page.refreshSeconds} seconds</p>
</div>
<div class="stats">
${cards}
</div>
<div class="stat-card">
  <h3>Last Updated</h3>
  <div>${escapeHtml(page.lastUpdate)}</div>
</div>
</body>
</html>
`;
}
