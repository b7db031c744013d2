/**
 * series.ts — Groups sale records into per-property time series.
 *
 * Grouping is exact (case-sensitive, no trimming). Nothing is dropped here;
 * exclusion is the qualifier's job. The returned map iterates in property
 * order (unit, then building) whatever order the records arrived in.
 */
import { compareProperties, propertyId, propertyLabel } from './helpers.ts';
import type { PropertySeries, SaleRecord } from '../types.ts';

export function groupSeries(records: readonly SaleRecord[]): Map<string, PropertySeries> {
  const buckets = new Map<string, SaleRecord[]>();
  for (const r of records) {
    const id = propertyId(r.property);
    const bucket = buckets.get(id);
    if (bucket) bucket.push(r);
    else buckets.set(id, [r]);
  }

  const series: PropertySeries[] = [];
  for (const [id, bucket] of buckets) {
    // Array.prototype.sort is stable: same-day sales keep their input order
    const sorted = [...bucket].sort((a, b) => a.date.getTime() - b.date.getTime());
    const first = sorted[0];
    const last = sorted[sorted.length - 1];
    if (!first || !last) continue; // unreachable, buckets are created with one record
    series.push({ id, key: propertyLabel(first.property), property: first.property, records: sorted, first, last });
  }

  series.sort((a, b) => compareProperties(a.property, b.property));
  return new Map(series.map(s => [s.id, s]));
}
