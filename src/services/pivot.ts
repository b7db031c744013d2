/**
 * pivot.ts — Wide-format output tables
 *
 * Each tracked entity owns one column; every value it contributes becomes a
 * new row with the date in column 0 and the value in the entity's column.
 * Rows are appended in call order and never merged or re-sorted.
 */
import { formatDay, formatMonth, formatPercent } from './helpers.ts';
import { computePercentageChange } from './pct-change.ts';
import type { ReferenceIndex } from './reference-index.ts';
import type { Datapoint, ReferenceRecord, TableData } from '../types.ts';

export const DATE_LABEL = 'date';

export interface PivotCell {
  date: string;
  value: string;
}

export class PivotTable implements TableData {
  private readonly _labels: string[];
  private readonly _rows: string[][] = [];

  constructor(dateLabel: string = DATE_LABEL) {
    this._labels = [dateLabel];
  }

  get labels(): readonly string[] { return this._labels; }
  get rows(): readonly (readonly string[])[] { return this._rows; }

  /** Adds a column, pads every existing row, then appends one row per cell */
  addColumn(label: string, cells: Iterable<PivotCell>): void {
    this._labels.push(label);
    for (const row of this._rows) row.push('');

    const width = this._labels.length;
    for (const cell of cells) {
      const row = new Array<string>(width).fill('');
      row[0] = cell.date;
      row[width - 1] = cell.value;
      this._rows.push(row);
    }
  }
}

type ReferencePrice = (r: ReferenceRecord) => number;

const REFERENCE_COLUMNS: ReadonlyArray<[suffix: string, price: ReferencePrice]> = [
  ['all sales average', r => r.averagePriceAll],
  ['flats average', r => r.averagePriceFlats],
];

/**
 * Raw prices: one column per selected property (rank order), then two per
 * region. `regions` must already be restricted to the selection's window.
 */
export function buildPriceTable(selection: readonly Datapoint[], regions: readonly ReferenceIndex[]): PivotTable {
  const table = new PivotTable();

  for (const dp of selection) {
    table.addColumn(dp.series.key, dp.series.records.map(r => ({
      date: formatMonth(r.date),
      value: String(r.pricePaid),
    })));
  }

  for (const index of regions) {
    const snapshots = index.records();
    for (const [suffix, price] of REFERENCE_COLUMNS) {
      table.addColumn(`${index.region}, ${suffix}`, snapshots.map(r => ({
        date: formatMonth(r.time),
        value: String(price(r)),
      })));
    }
  }

  return table;
}

/** One "<property> v <region>" column per (selected property, region) pair */
export function buildPercentageChangeTable(
  selection: readonly Datapoint[],
  regions: readonly ReferenceIndex[],
  decimals: number,
): PivotTable {
  const table = new PivotTable();

  for (const dp of selection) {
    for (const index of regions) {
      const change = computePercentageChange(dp.series, index);
      table.addColumn(`${change.property} v ${change.region}`, change.points.map(p => ({
        date: formatDay(p.date),
        value: formatPercent(p.diffPercent, decimals),
      })));
    }
  }

  return table;
}
