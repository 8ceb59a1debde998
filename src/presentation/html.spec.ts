import { escapeHtml, renderDashboardPage, renderStatusPage, renderTable, serializeForScript } from './html';

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<b class="x">Tom & 'Jerry'</b>`)).toBe(
      '&lt;b class=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/b&gt;',
    );
  });
});

describe('serializeForScript', () => {
  it('cannot close the surrounding script element', () => {
    expect(serializeForScript({ label: '</script>' })).toBe('{"label":"\\u003c/script\\u003e"}');
  });
});

describe('renderTable', () => {
  it('escapes cell text', () => {
    expect(renderTable({ header: ['Agent'], rows: [['<A>']] })).toBe(
      '<table>\n<tr><th>Agent</th></tr>\n<tr><td>&lt;A&gt;</td></tr>\n</table>',
    );
  });
});

describe('renderDashboardPage', () => {
  const html = renderDashboardPage({
    title: 'Calls',
    subtitle: 'Volume',
    kpis: [{ label: 'Total Calls', value: '3', color: '#2980b9' }],
    charts: [{ id: 'agent-chart', figure: { data: [], layout: { title: { text: 'Calls by Agent' }, paper_bgcolor: 'white' } } }],
    table: { heading: 'Agent Performance', table: null, emptyMessage: 'No data' },
    filter: { action: '/calls', range: { start: '2026-03-01', end: '2026-03-05' } },
    refreshHref: '/calls?start=2026-03-01&end=2026-03-05',
    refreshSeconds: 30,
  });

  it('sets up the auto-refresh', () => {
    expect(html).toContain('<meta http-equiv="refresh" content="30">');
  });

  it('pre-fills the date filter', () => {
    expect(html).toContain('<input type="date" id="start" name="start" value="2026-03-01">');
    expect(html).toContain('<input type="date" id="end" name="end" value="2026-03-05">');
  });

  it('renders KPI cards, chart slots and the empty table message', () => {
    expect(html).toContain('<div class="kpi-card"><h3>Total Calls</h3><h2 style="color: #2980b9">3</h2></div>');
    expect(html).toContain('<div class="chart-card"><div id="agent-chart"></div></div>');
    expect(html).toContain('<p>No data</p>');
    expect(html).toContain('<a class="button" href="/calls?start=2026-03-01&amp;end=2026-03-05">Refresh Data</a>');
  });
});

describe('renderStatusPage', () => {
  it('shows each card and the reading time', () => {
    const html = renderStatusPage({
      title: 'Sales Dashboard',
      cards: [
        { label: 'Total Contacts', value: '12' },
        { label: 'Users', value: '—' },
      ],
      lastUpdate: '2026-03-01 10:00:00',
      refreshSeconds: 30,
    });

    expect(html).toContain('<div class="stat-card"><h3>Total Contacts</h3><div class="value">12</div></div>');
    expect(html).toContain('<div class="stat-card"><h3>Users</h3><div class="value">—</div></div>');
    expect(html).toContain('<div>2026-03-01 10:00:00</div>');
    expect(html).toContain('<p>Auto-refreshing every 30 seconds</p>');
  });
});
