/**
 * reference-index.ts — One region's house price index, keyed by (month, year).
 * A later record for the same month replaces the earlier one.
 */
import { monthKey } from './helpers.ts';
import type { DateRange, ReferenceRecord } from '../types.ts';

export class ReferenceIndex {
  readonly region: string;
  private readonly byMonth: Map<string, ReferenceRecord>;

  private constructor(region: string, byMonth: Map<string, ReferenceRecord>) {
    this.region = region;
    this.byMonth = byMonth;
  }

  static fromRecords(region: string, records: Iterable<ReferenceRecord>): ReferenceIndex {
    const byMonth = new Map<string, ReferenceRecord>();
    for (const r of records) byMonth.set(monthKey(r.time), r);
    return new ReferenceIndex(region, byMonth);
  }

  get size(): number {
    return this.byMonth.size;
  }

  /** Snapshot for the month `date` falls in */
  lookup(date: Date): ReferenceRecord | undefined {
    return this.byMonth.get(monthKey(date));
  }

  /** New index holding only snapshots with min ≤ time ≤ max */
  restrictTo(range: DateRange): ReferenceIndex {
    const kept = new Map<string, ReferenceRecord>();
    for (const [k, r] of this.byMonth) {
      if (range.min <= r.time && r.time <= range.max) kept.set(k, r);
    }
    return new ReferenceIndex(this.region, kept);
  }

  /** Snapshots ascending by time */
  records(): ReferenceRecord[] {
    return [...this.byMonth.values()].sort((a, b) => a.time.getTime() - b.time.getTime());
  }
}
