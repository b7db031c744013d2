/**
 * batch.ts — Runs every configured estate against one shared set of regions.
 * Each region's reference file is read once per batch. Estates run in order
 * and the batch stops at the first failure.
 */
import type { EstateConfig, PipelineConfig } from '../schemas.ts';
import { childLogger } from '../shared/logger.ts';
import { loadRegions, runWithRegions, type PipelineDeps, type RunOptions } from './pipeline.ts';
import { rejectBelow } from './selection.ts';
import type { RunSummary } from '../types.ts';

export interface EstateSummary extends RunSummary {
  estate: string;
}

export function estateRunOptions(estate: EstateConfig, percentDecimals?: number): Omit<RunOptions, 'regions'> {
  return {
    salesSource: estate.sales,
    lengthFilter: rejectBelow(estate.minSales),
    dateDistanceFilter: rejectBelow(estate.minSpanDays),
    numberToReturn: estate.limit,
    priceTableDestination: estate.output.prices,
    percentageChangeDestination: estate.output.percentageChange,
    percentDecimals,
  };
}

export async function runBatch(
  config: PipelineConfig,
  deps: PipelineDeps,
  percentDecimals?: number,
): Promise<EstateSummary[]> {
  const log = deps.log ?? childLogger({ module: 'batch' });
  const regions = await loadRegions(config.regions, deps.provider);
  log.info({ regions: regions.map(r => ({ name: r.index.region, months: r.index.size })) }, 'Regions loaded');

  const summaries: EstateSummary[] = [];
  for (const estate of config.estates) {
    const estateLog = log.child({ estate: estate.name });
    estateLog.info({ sales: estate.sales, limit: estate.limit ?? 'all' }, 'Estate started');
    const summary = await runWithRegions(estateRunOptions(estate, percentDecimals), regions, { ...deps, log: estateLog });
    summaries.push({ estate: estate.name, ...summary });
  }
  return summaries;
}
