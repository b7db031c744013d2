import { describe, it, expect } from 'vitest';
import { groupSeries } from '../services/series.ts';
import { formatDay } from '../services/helpers.ts';
import { sale } from './fixtures.ts';

describe('groupSeries', () => {
  it('groups by (unit, building) and sorts each series by date', () => {
    const grouped = groupSeries([
      sale('Flat 2', 'Defoe House', '2010-05-01', 300),
      sale('Flat 1', 'Defoe House', '2005-01-10', 200),
      sale('Flat 2', 'Defoe House', '1999-07-20', 100),
      sale('Flat 2', 'Defoe House', '2004-02-02', 150),
    ]);

    expect(grouped.size).toBe(2);
    const flat2 = [...grouped.values()].find(s => s.key === 'Flat 2, Defoe House');
    expect(flat2?.records.map(r => r.pricePaid)).toEqual([100, 150, 300]);
    expect(flat2 && formatDay(flat2.first.date)).toBe('1999-07-20');
    expect(flat2 && formatDay(flat2.last.date)).toBe('2010-05-01');
  });

  it('treats keys case-sensitively and never drops a record', () => {
    const grouped = groupSeries([
      sale('Flat 1', 'Defoe House', '2001-01-01', 1),
      sale('FLAT 1', 'Defoe House', '2001-01-01', 2),
      sale('Flat 1', 'Defoe house', '2001-01-01', 3),
    ]);
    expect(grouped.size).toBe(3);
    const total = [...grouped.values()].reduce((n, s) => n + s.records.length, 0);
    expect(total).toBe(3);
  });

  it('does not merge keys whose labels collide on an embedded comma', () => {
    const grouped = groupSeries([
      sale('A, B', 'C', '2001-01-01', 1),
      sale('A', 'B, C', '2001-01-01', 2),
    ]);
    expect(grouped.size).toBe(2);
  });

  it('keeps same-day sales in input order', () => {
    const grouped = groupSeries([
      sale('Flat 1', 'Defoe House', '2001-01-01', 10),
      sale('Flat 1', 'Defoe House', '2001-01-01', 20),
    ]);
    const [series] = grouped.values();
    expect(series?.records.map(r => r.pricePaid)).toEqual([10, 20]);
  });

  it('iterates in property order regardless of input order', () => {
    const records = [
      sale('Flat 9', 'Bunyan Court', '2001-01-01', 1),
      sale('Flat 1', 'Defoe House', '2001-01-01', 1),
      sale('Flat 1', 'Andrewes House', '2001-01-01', 1),
    ];
    const forward = [...groupSeries(records).values()].map(s => s.key);
    const backward = [...groupSeries([...records].reverse()).values()].map(s => s.key);

    expect(forward).toEqual(['Flat 1, Andrewes House', 'Flat 1, Defoe House', 'Flat 9, Bunyan Court']);
    expect(backward).toEqual(forward);
  });
});
