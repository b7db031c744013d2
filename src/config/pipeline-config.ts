/**
 * config/pipeline-config.ts — Loads the estates/regions JSON file.
 * Relative paths inside it resolve against the file's own directory.
 */
import { readFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { PipelineConfigSchema, type PipelineConfig } from '../schemas.ts';
import { ConfigError } from '../shared/errors.ts';

export function parsePipelineConfig(raw: unknown, baseDir: string): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`invalid pipeline config: ${details.join('; ')}`);
  }

  const at = (p: string): string => resolve(baseDir, p);
  const config = result.data;
  return {
    regions: config.regions.map(r => ({ ...r, source: at(r.source) })),
    estates: config.estates.map(e => ({
      ...e,
      sales: at(e.sales),
      output: { prices: at(e.output.prices), percentageChange: at(e.output.percentageChange) },
    })),
  };
}

export async function loadPipelineConfig(path: string): Promise<PipelineConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new ConfigError(`cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`, { path });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, { path });
  }

  return parsePipelineConfig(raw, dirname(resolve(path)));
}
