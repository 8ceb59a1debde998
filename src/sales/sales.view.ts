import {
  countDistinct,
  countPresent,
  crossTab,
  explodeTagCounts,
  groupCounts,
  totalCount,
  wherePresent,
} from '../analytics/aggregator';
import { formatCount } from '../analytics/format';
import { SourceRecord, load } from '../analytics/table';
import {
  DisplayColumn,
  countsToRows,
  crossTabToRows,
  toChartSpec,
  toDisplayTable,
} from '../presentation/chart-spec';
import {
  CONTACT_COLUMNS,
  SAMPLE_ROWS,
  SalesDashboardView,
  SalesTrigger,
  TOP_REPS,
  TOP_SETTERS,
  TOP_STAGES,
} from './sales.schema';

const SAMPLE_COLUMNS: DisplayColumn[] = [
  { key: 'firstName', label: 'First Name' },
  { key: 'lastName', label: 'Last Name' },
  { key: 'phone', label: 'Phone' },
  { key: 'team', label: 'Team' },
  { key: 'setter', label: 'Setter' },
  { key: 'leadSource', label: 'Lead Source' },
];

/** Build the opportunities dashboard from a fresh batch of contact records. */
export function buildSalesView(records: readonly SourceRecord[], trigger: SalesTrigger = {}): SalesDashboardView {
  const now = trigger.now ?? new Date();
  const table = load(records, CONTACT_COLUMNS);

  const setterChart = toChartSpec(
    'bar',
    countsToRows(groupCounts(table, 'setter', TOP_SETTERS), 'Setter', 'Opportunities'),
    { category: 'Setter', value: 'Opportunities' },
    { title: 'Opportunities by Setter', colorScale: 'Greens', tickAngle: -45 },
  );
  const teamChart = toChartSpec(
    'bar',
    countsToRows(groupCounts(table, 'team'), 'Team', 'Opportunities'),
    { category: 'Team', value: 'Opportunities' },
    { title: 'Opportunities by Team', colorScale: 'Blues' },
  );
  const sourceChart = toChartSpec(
    'pie',
    countsToRows(groupCounts(table, 'leadSource'), 'Lead Source', 'Opportunities'),
    { category: 'Lead Source', value: 'Opportunities' },
    { title: 'Lead Sources Distribution' },
  );
  const pipelineChart = toChartSpec(
    'funnel',
    countsToRows(explodeTagCounts(table, 'tags', TOP_STAGES), 'Stage', 'Count'),
    { category: 'Stage', value: 'Count' },
    { title: 'Pipeline Funnel (by Tag)' },
  );
  const repChart = toChartSpec(
    'bar',
    countsToRows(groupCounts(table, 'rep', TOP_REPS), 'Rep', 'Opportunities'),
    { category: 'Rep', value: 'Opportunities' },
    { title: 'Top Reps by Opportunities', colorScale: 'Oranges', tickAngle: -45 },
  );
  const sourceByTeamChart = toChartSpec(
    'grouped-bar',
    crossTabToRows(crossTab(table, 'leadSource', 'team'), { a: 'leadSource', b: 'team', count: 'Count' }),
    { category: 'leadSource', value: 'Count', color: 'team' },
    { title: 'Lead Sources by Team', tickAngle: -45 },
  );

  return {
    kpis: {
      totalOpportunities: formatCount(totalCount(table)),
      withSetter: formatCount(countPresent(table, 'setter')),
      uniqueSetters: formatCount(countDistinct(table, 'setter')),
      teamsActive: formatCount(countDistinct(table, 'team')),
    },
    setterChart,
    teamChart,
    sourceChart,
    pipelineChart,
    repChart,
    sourceByTeamChart,
    sampleTable: toDisplayTable(wherePresent(table, 'setter').rows, SAMPLE_COLUMNS, SAMPLE_ROWS),
    generatedAt: now.toISOString(),
  };
}
