import {
  availableDateRange,
  filterByDate,
  parseDateRange,
  parseEventDate,
  withEventDate,
} from './date-range';
import { load } from './table';

function callTable() {
  return withEventDate(
    load([
      { id: '1', callDate: '2026-03-01T09:15:00Z' },
      { id: '2', callDate: '2026-03-03T23:59:59Z' },
      { id: '3', callDate: 'not a date' },
      { id: '4' },
      { id: '5', callDate: new Date('2026-03-05T12:00:00Z') },
    ]),
    'callDate',
  );
}

describe('parseEventDate', () => {
  it('takes the UTC calendar day of strings, dates and epoch milliseconds', () => {
    expect(parseEventDate('2026-03-01T23:30:00-02:00')).toBe('2026-03-02');
    expect(parseEventDate(new Date('2026-03-01T00:00:00Z'))).toBe('2026-03-01');
    expect(parseEventDate(Date.UTC(2026, 2, 4, 8))).toBe('2026-03-04');
  });

  describe('timestamps without an offset', () => {
    const hostZone = process.env.TZ;

    beforeAll(() => {
      process.env.TZ = 'America/New_York';
    });

    afterAll(() => {
      if (hostZone === undefined) {
        delete process.env.TZ;
      } else {
        process.env.TZ = hostZone;
      }
    });

    it('keeps the day as written whatever the host timezone', () => {
      expect(parseEventDate('2026-03-01T21:30:00')).toBe('2026-03-01');
      expect(parseEventDate('2026-03-01 21:30')).toBe('2026-03-01');
      expect(parseEventDate('2026-03-01T21:30:00.250')).toBe('2026-03-01');
    });

    it('puts an evening call inside a single-day filter', () => {
      const table = withEventDate(load([{ id: '1', callDate: '2026-03-01T21:30:00' }]), 'callDate');
      const filtered = filterByDate(table, { start: '2026-03-01', end: '2026-03-01' });
      expect(filtered.rows.map((r) => r.id)).toEqual(['1']);
    });
  });

  it('returns null for anything unparsable', () => {
    expect(parseEventDate('yesterday-ish')).toBeNull();
    expect(parseEventDate('')).toBeNull();
    expect(parseEventDate(null)).toBeNull();
    expect(parseEventDate(['2026-03-01'])).toBeNull();
  });
});

describe('filterByDate', () => {
  it('keeps rows inside the inclusive range and drops undated rows', () => {
    const filtered = filterByDate(callTable(), { start: '2026-03-01', end: '2026-03-03' });
    expect(filtered.rows.map((r) => r.id)).toEqual(['1', '2']);
  });

  it('returns the input unchanged without a range', () => {
    const table = callTable();
    expect(filterByDate(table)).toBe(table);
    expect(filterByDate(table).rows).toHaveLength(5);
  });

  it('is idempotent', () => {
    const range = { start: '2026-03-02', end: '2026-03-05' };
    const once = filterByDate(callTable(), range);
    const twice = filterByDate(once, range);
    expect(twice.rows).toEqual(once.rows);
    expect(twice.rows.map((r) => r.id)).toEqual(['2', '5']);
  });
});

describe('availableDateRange', () => {
  it('spans the earliest and latest event date', () => {
    expect(availableDateRange(callTable())).toEqual({ start: '2026-03-01', end: '2026-03-05' });
  });

  it('falls back to today when nothing is dated', () => {
    const today = new Date('2026-10-18T08:00:00Z');
    expect(availableDateRange(withEventDate(load([]), 'callDate'), undefined, today)).toEqual({
      start: '2026-10-18',
      end: '2026-10-18',
    });
  });
});

describe('parseDateRange', () => {
  it('needs both ends as calendar days', () => {
    expect(parseDateRange('2026-03-01', '2026-03-04')).toEqual({ start: '2026-03-01', end: '2026-03-04' });
    expect(parseDateRange('2026-03-01', undefined)).toBeUndefined();
    expect(parseDateRange('03/01/2026', '2026-03-04')).toBeUndefined();
    expect(parseDateRange('2026-13-01', '2026-03-04')).toBeUndefined();
  });

  it('ignores days that do not exist in the month', () => {
    expect(parseDateRange('2026-02-30', '2026-03-05')).toBeUndefined();
    expect(parseDateRange('2026-03-01', '2026-04-31')).toBeUndefined();
    expect(parseDateRange('2028-02-29', '2028-03-01')).toEqual({ start: '2028-02-29', end: '2028-03-01' });
  });

  it('swaps reversed ends', () => {
    expect(parseDateRange('2026-03-04', '2026-03-01')).toEqual({ start: '2026-03-01', end: '2026-03-04' });
  });
});
