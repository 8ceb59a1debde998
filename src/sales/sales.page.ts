import { toPlotlyFigure } from '../presentation/plotly';
import { DashboardPage } from '../presentation/html';
import { SalesDashboardView } from './sales.schema';

export function toSalesPage(view: SalesDashboardView, refreshSeconds: number): DashboardPage {
  return {
    title: 'Opportunities Dashboard',
    subtitle: 'Track opportunities, setters, lead sources, and team performance',
    kpis: [
      { label: 'Total Opportunities', value: view.kpis.totalOpportunities, color: '#2980b9' },
      { label: 'With Setter', value: view.kpis.withSetter, color: '#27ae60' },
      { label: 'Unique Setters', value: view.kpis.uniqueSetters, color: '#8e44ad' },
      { label: 'Teams Active', value: view.kpis.teamsActive, color: '#e67e22' },
    ],
    charts: [
      { id: 'setter-chart', figure: toPlotlyFigure(view.setterChart) },
      { id: 'team-chart', figure: toPlotlyFigure(view.teamChart) },
      { id: 'source-chart', figure: toPlotlyFigure(view.sourceChart) },
      { id: 'pipeline-chart', figure: toPlotlyFigure(view.pipelineChart) },
      { id: 'rep-chart', figure: toPlotlyFigure(view.repChart) },
      { id: 'conversion-chart', figure: toPlotlyFigure(view.sourceByTeamChart) },
    ],
    table: { heading: 'Top Opportunities', table: view.sampleTable, emptyMessage: 'No data' },
    refreshHref: '/sales',
    refreshSeconds,
  };
}
