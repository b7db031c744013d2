/**
 * pipeline.ts — Batch entry point
 *
 * read → group → qualify/score/rank → date range → reference window
 *      → price table + percentage-change table → sink
 *
 * Both tables are built in memory before either is written, so a failure in
 * any stage leaves no partial output behind.
 */
import { env } from '../config/env.ts';
import { childLogger, type Logger } from '../shared/logger.ts';
import { DateRangeAccumulator } from './date-range.ts';
import { buildPercentageChangeTable, buildPriceTable, type PivotTable } from './pivot.ts';
import { ReferenceIndex } from './reference-index.ts';
import { selectSeries } from './selection.ts';
import { groupSeries } from './series.ts';
import type {
  DateRange, DecodeFailure, RecordProvider, RegionSource, RunSummary, SaleRecord, SeriesFilter, TableSink,
} from '../types.ts';

export interface RunOptions {
  salesSource: string;
  regions: RegionSource[];
  lengthFilter: SeriesFilter;
  dateDistanceFilter: SeriesFilter;
  numberToReturn?: number;
  priceTableDestination: string;
  percentageChangeDestination: string;
  percentDecimals?: number;
}

export interface PipelineDeps {
  provider: RecordProvider;
  sink: TableSink;
  log?: Logger;
}

export interface LoadedRegion {
  index: ReferenceIndex;
  failures: DecodeFailure[];
}

export interface PivotResult {
  priceTable: PivotTable;
  percentageChangeTable: PivotTable;
  summary: Omit<RunSummary, 'saleRecords' | 'saleFailures' | 'referenceFailures'>;
}

/** Reads every region's reference records, in the order given */
export async function loadRegions(regions: readonly RegionSource[], provider: RecordProvider): Promise<LoadedRegion[]> {
  const loaded: LoadedRegion[] = [];
  for (const region of regions) {
    const { records, failures } = await provider.readReferenceRecords(region.source);
    loaded.push({ index: ReferenceIndex.fromRecords(region.name, records), failures });
  }
  return loaded;
}

/** Pure part of a run: from decoded sales and region indices to both tables */
export function buildPivotTables(
  sales: readonly SaleRecord[],
  regions: readonly ReferenceIndex[],
  options: Pick<RunOptions, 'lengthFilter' | 'dateDistanceFilter' | 'numberToReturn' | 'percentDecimals'>,
): PivotResult {
  const grouped = groupSeries(sales);
  const { qualifying, selected } = selectSeries(
    grouped.values(),
    { lengthFilter: options.lengthFilter, dateDistanceFilter: options.dateDistanceFilter },
    options.numberToReturn,
  );

  const acc = DateRangeAccumulator.of(selected);
  let range: DateRange | null = null;
  let windowed: ReferenceIndex[] = [];
  if (regions.length > 0) {
    const window = acc.window(); // EmptySelectionError when nothing was selected
    range = acc.range();
    windowed = regions.map(r => r.restrictTo(window));
  } else if (!acc.isEmpty()) {
    range = acc.range();
  }

  const priceTable = buildPriceTable(selected, windowed);
  const percentageChangeTable = buildPercentageChangeTable(selected, windowed, options.percentDecimals ?? env.PERCENT_DECIMALS);

  return {
    priceTable,
    percentageChangeTable,
    summary: {
      series: grouped.size,
      qualifying,
      selected: selected.length,
      range,
      priceRows: priceTable.rows.length,
      percentageChangeRows: percentageChangeTable.rows.length,
    },
  };
}

/** Runs one estate against regions that are already loaded */
export async function runWithRegions(
  options: Omit<RunOptions, 'regions'>,
  regions: readonly LoadedRegion[],
  deps: PipelineDeps,
): Promise<RunSummary> {
  const log = deps.log ?? childLogger({ module: 'pipeline' });
  const start = Date.now();

  const sales = await deps.provider.readSaleRecords(options.salesSource);
  const result = buildPivotTables(sales.records, regions.map(r => r.index), options);

  await deps.sink.writeTable(result.priceTable, options.priceTableDestination);
  await deps.sink.writeTable(result.percentageChangeTable, options.percentageChangeDestination);

  const summary: RunSummary = {
    saleRecords: sales.records.length,
    saleFailures: sales.failures.length,
    referenceFailures: regions.reduce((n, r) => n + r.failures.length, 0),
    ...result.summary,
  };
  log.info({ ...summary, durationMs: Date.now() - start }, 'Run complete');
  return summary;
}

export async function runPipeline(options: RunOptions, deps: PipelineDeps): Promise<RunSummary> {
  const regions = await loadRegions(options.regions, deps.provider);
  return runWithRegions(options, regions, deps);
}
