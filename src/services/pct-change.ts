/**
 * pct-change.ts — Excess appreciation of a property over a region.
 *
 * For each consecutive pair of sales (prev, curr):
 *   local = (curr.price - prev.price) / prev.price
 *   ref   = (flats[curr month] - flats[prev month]) / flats[prev month]
 *   diff  = (local - ref) × 100
 * The first sale is the baseline and always reads 0.
 */
import { DivisionByZeroError, MissingReferenceKeyError } from '../shared/errors.ts';
import type { ReferenceIndex } from './reference-index.ts';
import type { PercentageChangePoint, PercentageChangeSeries, PropertySeries, ReferenceRecord, SaleRecord } from '../types.ts';

function snapshotFor(series: PropertySeries, index: ReferenceIndex, sale: SaleRecord): ReferenceRecord {
  const ref = index.lookup(sale.date);
  if (!ref) throw new MissingReferenceKeyError(series.key, index.region, sale.date);
  return ref;
}

export function computePercentageChange(series: PropertySeries, index: ReferenceIndex): PercentageChangeSeries {
  const points: PercentageChangePoint[] = [{ date: series.first.date, diffPercent: 0 }];

  let prev = series.first;
  let prevRef = snapshotFor(series, index, prev);
  for (const curr of series.records.slice(1)) {
    const currRef = snapshotFor(series, index, curr);

    if (prev.pricePaid === 0) throw new DivisionByZeroError(series.key, index.region, curr.date, 'pricePaid');
    if (prevRef.averagePriceFlats === 0) throw new DivisionByZeroError(series.key, index.region, curr.date, 'averagePriceFlats');

    const localChange = (curr.pricePaid - prev.pricePaid) / prev.pricePaid;
    const refChange = (currRef.averagePriceFlats - prevRef.averagePriceFlats) / prevRef.averagePriceFlats;
    points.push({ date: curr.date, diffPercent: (localChange - refChange) * 100 });

    prev = curr;
    prevRef = currRef;
  }

  return { property: series.key, region: index.region, points };
}
