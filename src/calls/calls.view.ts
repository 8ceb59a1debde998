import {
  countMatching,
  groupAgg,
  groupCounts,
  sumNumeric,
  totalCount,
} from '../analytics/aggregator';
import { availableDateRange, filterByDate, withEventDate } from '../analytics/date-range';
import { formatDuration, rate } from '../analytics/format';
import { Row, SourceRecord, load } from '../analytics/table';
import { DisplayColumn, countsToRows, toChartSpec, toDisplayTable } from '../presentation/chart-spec';
import { CALL_COLUMNS, CONNECTED_OUTCOMES, CallDashboardView, CallTrigger, TOP_AGENTS } from './calls.schema';

const AGENT_COLUMNS: DisplayColumn[] = [
  { key: 'agent', label: 'Agent' },
  { key: 'totalCalls', label: 'Total Calls' },
  { key: 'connections', label: 'Connections' },
  { key: 'connectionRate', label: 'Connection %' },
  { key: 'talkTime', label: 'Talk Time' },
];

/**
 * Build the calls dashboard from a fresh batch of call records.
 * The date range applies to the UTC day of `callDate`.
 */
export function buildCallsView(records: readonly SourceRecord[], trigger: CallTrigger = {}): CallDashboardView {
  const now = trigger.now ?? new Date();
  const table = withEventDate(load(records, CALL_COLUMNS), 'callDate');
  const filtered = filterByDate(table, trigger.range);

  const total = totalCount(filtered);
  const connections = countMatching(filtered, 'outcome', CONNECTED_OUTCOMES);

  const outcomeChart = toChartSpec(
    'pie',
    countsToRows(groupCounts(filtered, 'outcome'), 'Outcome', 'Count'),
    { category: 'Outcome', value: 'Count' },
    { title: 'Call Outcomes' },
  );
  const agentChart = toChartSpec(
    'bar',
    countsToRows(groupCounts(filtered, 'agent', TOP_AGENTS), 'Agent', 'Calls'),
    { category: 'Agent', value: 'Calls' },
    { title: 'Calls by Agent', colorScale: 'Blues', tickAngle: -45 },
  );

  const agentRows: Row[] = groupAgg(
    filtered,
    'agent',
    {
      totalCalls: { kind: 'count' },
      connections: { kind: 'matching', column: 'outcome', values: CONNECTED_OUTCOMES },
      totalDuration: { kind: 'sum', column: 'duration' },
    },
    'connections',
  ).map(({ key, values }) => ({
    agent: key,
    totalCalls: values.totalCalls,
    connections: values.connections,
    connectionRate: rate(values.connections, values.totalCalls),
    talkTime: formatDuration(values.totalDuration),
  }));

  return {
    kpis: {
      totalCalls: String(total),
      connections: String(connections),
      connectionRate: rate(connections, total),
      talkTime: formatDuration(sumNumeric(filtered, 'duration')),
    },
    outcomeChart,
    agentChart,
    agentTable: totalCount(table) === 0 ? null : toDisplayTable(agentRows, AGENT_COLUMNS, agentRows.length),
    availableRange: availableDateRange(table, undefined, now),
    appliedRange: trigger.range ?? null,
    generatedAt: now.toISOString(),
  };
}
