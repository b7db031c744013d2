/**
 * date-range.ts — Tracks the earliest first sale and latest last sale
 * across the selected series.
 */
import { startOfMonth } from 'date-fns';
import { EmptySelectionError } from '../shared/errors.ts';
import type { DateRange, Datapoint } from '../types.ts';

export class DateRangeAccumulator {
  private min: Date | null = null;
  private max: Date | null = null;

  static of(datapoints: Iterable<Datapoint>): DateRangeAccumulator {
    const acc = new DateRangeAccumulator();
    for (const dp of datapoints) acc.add(dp.first, dp.last);
    return acc;
  }

  add(first: Date, last: Date): void {
    if (!this.min || first < this.min) this.min = first;
    if (!this.max || last > this.max) this.max = last;
  }

  isEmpty(): boolean {
    return this.min === null;
  }

  /** Throws EmptySelectionError when nothing was added */
  range(): DateRange {
    if (!this.min || !this.max) throw new EmptySelectionError();
    return { min: this.min, max: this.max };
  }

  /**
   * Reference window. Snapshots are stamped on the first of the month, so the
   * lower bound is pulled back to the start of the earliest sale's month.
   */
  window(): DateRange {
    const { min, max } = this.range();
    return { min: startOfMonth(min), max };
  }
}
