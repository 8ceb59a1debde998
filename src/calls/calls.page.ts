import { toPlotlyFigure } from '../presentation/plotly';
import { DashboardPage } from '../presentation/html';
import { CallDashboardView } from './calls.schema';

export function toCallsPage(view: CallDashboardView, refreshHref: string, refreshSeconds: number): DashboardPage {
  return {
    title: 'Kixie Call Center Dashboard',
    subtitle: 'Track call volume, connections, and agent performance',
    filter: { action: '/calls', range: view.appliedRange ?? view.availableRange },
    kpis: [
      { label: 'Total Calls', value: view.kpis.totalCalls, color: '#2980b9' },
      { label: 'Connections', value: view.kpis.connections, color: '#27ae60' },
      { label: 'Connection Rate', value: view.kpis.connectionRate, color: '#8e44ad' },
      { label: 'Total Talk Time', value: view.kpis.talkTime, color: '#e67e22' },
    ],
    charts: [
      { id: 'outcome-chart', figure: toPlotlyFigure(view.outcomeChart) },
      { id: 'agent-chart', figure: toPlotlyFigure(view.agentChart) },
    ],
    table: { heading: 'Agent Performance', table: view.agentTable, emptyMessage: 'No data' },
    refreshHref,
    refreshSeconds,
  };
}
