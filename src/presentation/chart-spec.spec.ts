import { load } from '../analytics/table';
import { countsToRows, crossTabToRows, displayValue, toChartSpec, toDisplayTable } from './chart-spec';

describe('toChartSpec', () => {
  it('describes the chart without rendering it', () => {
    const rows = countsToRows(
      [
        { category: 'A', count: 3 },
        { category: 'B', count: 1 },
      ],
      'Agent',
      'Calls',
    );
    const spec = toChartSpec('bar', rows, { category: 'Agent', value: 'Calls' }, {
      title: 'Calls by Agent',
      colorScale: 'Blues',
      tickAngle: -45,
    });

    expect(spec).toEqual({
      kind: 'bar',
      title: 'Calls by Agent',
      encoding: { category: 'Agent', value: 'Calls' },
      rows: [
        { Agent: 'A', Calls: 3 },
        { Agent: 'B', Calls: 1 },
      ],
      colorScale: 'Blues',
      tickAngle: -45,
    });
  });

  it('leaves optional styling out when not given', () => {
    const spec = toChartSpec('pie', [], { category: 'Outcome', value: 'Count' }, { title: 'Call Outcomes' });
    expect(spec).toEqual({ kind: 'pie', title: 'Call Outcomes', encoding: { category: 'Outcome', value: 'Count' }, rows: [] });
  });
});

describe('crossTabToRows', () => {
  it('names the pair columns', () => {
    expect(crossTabToRows([{ a: 'Web', b: 'North', count: 2 }], { a: 'leadSource', b: 'team', count: 'Count' })).toEqual([
      { leadSource: 'Web', team: 'North', Count: 2 },
    ]);
  });
});

describe('toDisplayTable', () => {
  const rows = load([
    { id: '1', firstName: 'Ada', team: 'North' },
    { id: '2', firstName: 'Ben', tags: ['hot', 'new'] },
    { id: '3', firstName: 'Cy', team: 'South' },
  ]).rows;

  it('keeps order, renders nulls as empty cells and truncates', () => {
    const table = toDisplayTable(
      rows,
      [
        { key: 'firstName', label: 'First Name' },
        { key: 'team', label: 'Team' },
        { key: 'tags', label: 'Tags' },
      ],
      2,
    );

    expect(table).toEqual({
      header: ['First Name', 'Team', 'Tags'],
      rows: [
        ['Ada', 'North', ''],
        ['Ben', '', 'hot, new'],
      ],
    });
  });

  it('renders dates as ISO strings', () => {
    expect(displayValue(new Date('2026-03-01T00:00:00Z'))).toBe('2026-03-01T00:00:00.000Z');
    expect(displayValue(12)).toBe('12');
  });
});
