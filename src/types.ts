// ═══════════════════════════════════════════════════════
// House Price Pivot — Core Type Definitions
// Every data shape passed between pipeline stages.
// ═══════════════════════════════════════════════════════

// ── Source records ──

export interface PropertyKey {
  unit: string;       // SAON, e.g. "Flat 12"
  building: string;   // PAON, e.g. "Defoe House"
}

export interface SaleRecord {
  date: Date;         // deed date (calendar day)
  pricePaid: number;  // integer, whole currency units
  property: PropertyKey;
  estate: string;     // street; informational only
}

export interface ReferenceRecord {
  region: string;
  time: Date;         // first of month
  averagePriceAll: number;
  averagePriceFlats: number;
  hpiAll: number;
  hpiFlats: number;
  percentageChangeMonthlyAll?: number;
  percentageChangeYearlyAll?: number;
  percentageChangeMonthlyFlats?: number;
  percentageChangeYearlyFlats?: number;
  salesVolume?: number;
}

// ── Derived shapes ──

export interface PropertySeries {
  id: string;                       // exact grouping identity
  key: string;                      // "<unit>, <building>", the column label
  property: PropertyKey;
  records: readonly SaleRecord[];   // ascending by date, never empty
  first: SaleRecord;
  last: SaleRecord;
}

export interface Datapoint {
  series: PropertySeries;
  score: number;
  first: Date;
  last: Date;
}

export interface DateRange {
  min: Date;
  max: Date;
}

export interface PercentageChangePoint {
  date: Date;
  diffPercent: number;
}

export interface PercentageChangeSeries {
  property: string;
  region: string;
  points: PercentageChangePoint[];
}

/** Reject on `true`. */
export type SeriesFilter = (value: number) => boolean;

export interface SeriesFilters {
  lengthFilter: SeriesFilter;
  dateDistanceFilter: SeriesFilter;
}

// ── Tables ──

export interface TableData {
  readonly labels: readonly string[];
  readonly rows: readonly (readonly string[])[];
}

// ── I/O collaborators ──

export interface DecodeFailure {
  source: string;
  row: number;        // 1-based data row, header excluded
  message: string;
}

export interface DecodeResult<T> {
  records: T[];
  failures: DecodeFailure[];
}

export interface RecordProvider {
  readSaleRecords(source: string): Promise<DecodeResult<SaleRecord>>;
  readReferenceRecords(source: string): Promise<DecodeResult<ReferenceRecord>>;
}

export interface TableSink {
  writeTable(table: TableData, destination: string): Promise<void>;
}

// ── Run contract ──

export interface RegionSource {
  name: string;
  source: string;
}

export interface RunSummary {
  saleRecords: number;
  saleFailures: number;
  referenceFailures: number;
  series: number;
  qualifying: number;
  selected: number;
  range: DateRange | null;
  priceRows: number;
  percentageChangeRows: number;
}
