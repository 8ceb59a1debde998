// Calls dashboard types - no persisted schema, the view is rebuilt from kixie_calls on every request

import { DateRange } from '../analytics/date-range';
import { ChartSpec, DisplayTable } from '../presentation/chart-spec';

export const CALLS_COLLECTION = 'kixie_calls';

export const CALL_COLUMNS = [
  'id',
  'agent',
  'phoneNumber',
  'direction',
  'outcome',
  'duration',
  'callDate',
  'callEndDate',
  'receivedAt',
];

/** Outcomes that count as a connected call. */
export const CONNECTED_OUTCOMES = ['connected', 'answered', 'success'];

export const TOP_AGENTS = 10;

export interface CallTrigger {
  range?: DateRange;
  now?: Date;
}

export interface CallKpis {
  totalCalls: string;
  connections: string;
  connectionRate: string;
  talkTime: string;
}

export interface CallDashboardView {
  kpis: CallKpis;
  outcomeChart: ChartSpec;
  agentChart: ChartSpec;
  agentTable: DisplayTable | null;
  availableRange: DateRange;
  appliedRange: DateRange | null;
  generatedAt: string;
}
