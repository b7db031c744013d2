import { parseDay } from '../services/helpers.ts';
import type {
  DecodeResult, RecordProvider, ReferenceRecord, SaleRecord, TableData, TableSink,
} from '../types.ts';

export function day(iso: string): Date {
  const d = parseDay(iso);
  if (!d) throw new Error(`bad fixture date ${iso}`);
  return d;
}

export function sale(unit: string, building: string, iso: string, pricePaid: number, estate = 'Test Estate'): SaleRecord {
  return { date: day(iso), pricePaid, property: { unit, building }, estate };
}

export function ref(region: string, iso: string, averagePriceFlats: number, averagePriceAll = averagePriceFlats * 2): ReferenceRecord {
  return { region, time: day(iso), averagePriceAll, averagePriceFlats, hpiAll: 100, hpiFlats: 100 };
}

/** Monthly snapshots from `fromIso` for `months` months, flats price rising by `step` */
export function monthlyRefs(region: string, fromIso: string, months: number, start = 1000, step = 10): ReferenceRecord[] {
  const first = day(fromIso);
  return Array.from({ length: months }, (_, i) => ({
    region,
    time: new Date(first.getFullYear(), first.getMonth() + i, 1),
    averagePriceAll: 2 * (start + i * step),
    averagePriceFlats: start + i * step,
    hpiAll: 100,
    hpiFlats: 100,
  }));
}

export class MemoryRecordProvider implements RecordProvider {
  reads: string[] = [];

  constructor(
    private sales: Record<string, SaleRecord[]>,
    private references: Record<string, ReferenceRecord[]>,
  ) {}

  async readSaleRecords(source: string): Promise<DecodeResult<SaleRecord>> {
    this.reads.push(source);
    return { records: this.sales[source] ?? [], failures: [] };
  }

  async readReferenceRecords(source: string): Promise<DecodeResult<ReferenceRecord>> {
    this.reads.push(source);
    return { records: this.references[source] ?? [], failures: [] };
  }
}

export class MemoryTableSink implements TableSink {
  written = new Map<string, TableData>();

  async writeTable(table: TableData, destination: string): Promise<void> {
    this.written.set(destination, { labels: [...table.labels], rows: table.rows.map(r => [...r]) });
  }
}
