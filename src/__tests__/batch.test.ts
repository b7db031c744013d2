import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadPipelineConfig, parsePipelineConfig } from '../config/pipeline-config.ts';
import { parseEnv } from '../config/env.ts';
import { estateRunOptions, runBatch } from '../services/batch.ts';
import { ConfigError } from '../shared/errors.ts';
import { MemoryRecordProvider, MemoryTableSink, monthlyRefs, sale } from './fixtures.ts';

const RAW_CONFIG = {
  regions: [{ name: 'London', source: 'reference/london.csv' }],
  estates: [
    {
      name: 'barbican',
      sales: 'estates/barbican.csv',
      limit: 10,
      output: { prices: 'out/barbican-prices.csv', percentageChange: 'out/barbican-changes.csv' },
    },
    {
      name: 'golden-lane',
      sales: 'estates/golden-lane.csv',
      minSales: 2,
      minSpanDays: 365,
      output: { prices: 'out/gl-prices.csv', percentageChange: 'out/gl-changes.csv' },
    },
  ],
};

describe('parsePipelineConfig', () => {
  it('applies default thresholds and resolves paths against the config directory', () => {
    const config = parsePipelineConfig(RAW_CONFIG, '/data/run');

    expect(config.regions).toEqual([{ name: 'London', source: '/data/run/reference/london.csv' }]);
    expect(config.estates[0]).toMatchObject({
      minSales: 3,
      minSpanDays: 7300,
      limit: 10,
      sales: '/data/run/estates/barbican.csv',
      output: { prices: '/data/run/out/barbican-prices.csv', percentageChange: '/data/run/out/barbican-changes.csv' },
    });
    expect(config.estates[1]?.limit).toBeUndefined();
  });

  it('rejects a config without estates', () => {
    expect(() => parsePipelineConfig({ regions: [] }, '/data')).toThrow(ConfigError);
  });
});

describe('loadPipelineConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'house-price-pivot-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a JSON file', async () => {
    await writeFile(join(dir, 'pipeline.json'), JSON.stringify(RAW_CONFIG));
    const config = await loadPipelineConfig(join(dir, 'pipeline.json'));
    expect(config.estates.map(e => e.name)).toEqual(['barbican', 'golden-lane']);
    expect(config.estates[1]?.sales).toBe(join(dir, 'estates/golden-lane.csv'));
  });

  it('fails with ConfigError for malformed JSON', async () => {
    await writeFile(join(dir, 'pipeline.json'), '{ "regions": ');
    await expect(loadPipelineConfig(join(dir, 'pipeline.json'))).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('estateRunOptions', () => {
  it('turns thresholds into rejecting filters', () => {
    const [estate] = parsePipelineConfig(RAW_CONFIG, '/data').estates;
    if (!estate) throw new Error('no estate');
    const options = estateRunOptions(estate, 3);

    expect(options.lengthFilter(2)).toBe(true);
    expect(options.lengthFilter(3)).toBe(false);
    expect(options.dateDistanceFilter(7299)).toBe(true);
    expect(options.dateDistanceFilter(7300)).toBe(false);
    expect(options.numberToReturn).toBe(10);
    expect(options.percentDecimals).toBe(3);
  });
});

describe('runBatch', () => {
  it('reads each region once and runs every estate', async () => {
    const config = parsePipelineConfig(RAW_CONFIG, '/data');
    const provider = new MemoryRecordProvider(
      {
        '/data/estates/barbican.csv': [
          sale('Flat 1', 'Defoe House', '1992-02-02', 100),
          sale('Flat 1', 'Defoe House', '2001-05-05', 200),
          sale('Flat 1', 'Defoe House', '2015-08-08', 300),
        ],
        '/data/estates/golden-lane.csv': [
          sale('12', 'Crescent House', '2010-01-10', 300),
          sale('12', 'Crescent House', '2012-06-30', 330),
        ],
      },
      { '/data/reference/london.csv': monthlyRefs('London', '1990-01-01', 360) },
    );
    const sink = new MemoryTableSink();

    const summaries = await runBatch(config, { provider, sink }, 2);

    expect(summaries.map(s => [s.estate, s.selected])).toEqual([['barbican', 1], ['golden-lane', 1]]);
    expect(provider.reads.filter(r => r.endsWith('london.csv'))).toHaveLength(1);
    expect([...sink.written.keys()]).toEqual([
      '/data/out/barbican-prices.csv',
      '/data/out/barbican-changes.csv',
      '/data/out/gl-prices.csv',
      '/data/out/gl-changes.csv',
    ]);
    expect(sink.written.get('/data/out/gl-changes.csv')?.labels).toEqual(['date', '12, Crescent House v London']);
  });
});

describe('parseEnv', () => {
  it('fills defaults', () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: 'development',
      PIPELINE_CONFIG: 'config/pipeline.json',
      PERCENT_DECIMALS: 4,
      LOG_LEVEL: 'info',
    });
  });

  it('rejects an unknown log level', () => {
    expect(() => parseEnv({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});
