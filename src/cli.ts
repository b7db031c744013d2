/**
 * cli.ts — Batch entry point
 *
 *   PIPELINE_CONFIG=config/pipeline.json tsx src/cli.ts
 *
 * Reads the estates/regions config, writes both tables for every estate and
 * exits non-zero on the first failure.
 */
import dotenv from 'dotenv';

dotenv.config();

const { env } = await import('./config/env.ts');
const { loadPipelineConfig } = await import('./config/pipeline-config.ts');
const { logger } = await import('./shared/logger.ts');
const { PipelineError } = await import('./shared/errors.ts');
const { runBatch } = await import('./services/batch.ts');
const { CsvRecordProvider } = await import('./services/sources.ts');
const { CsvTableSink } = await import('./services/sink.ts');

const BOOT_TIME = Date.now();

try {
  const config = await loadPipelineConfig(env.PIPELINE_CONFIG);
  logger.info({ config: env.PIPELINE_CONFIG, estates: config.estates.length, regions: config.regions.length }, 'Batch started');

  const summaries = await runBatch(config, {
    provider: new CsvRecordProvider(),
    sink: new CsvTableSink(),
  }, env.PERCENT_DECIMALS);

  for (const s of summaries) {
    logger.info({ estate: s.estate, selected: s.selected, qualifying: s.qualifying, failures: s.saleFailures + s.referenceFailures }, 'Estate done');
  }
  logger.info({ totalMs: Date.now() - BOOT_TIME }, 'Batch complete');
} catch (err) {
  if (err instanceof PipelineError) {
    logger.error({ err, code: err.code, stage: err.stage, ...err.context }, 'Batch failed');
  } else {
    logger.fatal({ err }, 'Batch failed unexpectedly');
  }
  logger.flush();
  process.exitCode = 1;
}
