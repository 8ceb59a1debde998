// Sales dashboard types: the view is rebuilt from ghl_contacts on every request

import { ChartSpec, DisplayTable } from '../presentation/chart-spec';

export const CONTACTS_COLLECTION = 'ghl_contacts';

export const CONTACT_COLUMNS = [
  'id',
  'firstName',
  'lastName',
  'phone',
  'email',
  'team',
  'rep',
  'leadSource',
  'type',
  'syncedAt',
  'setter',
  'tags',
];

export const TOP_SETTERS = 15;
export const TOP_REPS = 15;
export const TOP_STAGES = 12;
export const SAMPLE_ROWS = 25;

export interface SalesTrigger {
  now?: Date;
}

export interface SalesKpis {
  totalOpportunities: string;
  withSetter: string;
  uniqueSetters: string;
  teamsActive: string;
}

export interface SalesDashboardView {
  kpis: SalesKpis;
  setterChart: ChartSpec;
  teamChart: ChartSpec;
  sourceChart: ChartSpec;
  pipelineChart: ChartSpec;
  repChart: ChartSpec;
  sourceByTeamChart: ChartSpec;
  sampleTable: DisplayTable;
  generatedAt: string;
}
