/**
 * sources.ts — CSV record provider
 *
 * Reads a whole file, splits it with Papa Parse (header row → keys) and
 * validates each row against its zod schema. A malformed row is logged and
 * reported as a DecodeFailure; the rest of the file is still read.
 */
import { readFile } from 'fs/promises';
import Papa from 'papaparse';
import type { z } from 'zod';
import { ReferenceRowSchema, SaleRowSchema } from '../schemas.ts';
import { DecodeError, SourceReadError } from '../shared/errors.ts';
import { childLogger, type Logger } from '../shared/logger.ts';
import type { DecodeFailure, DecodeResult, RecordProvider, ReferenceRecord, SaleRecord } from '../types.ts';

type RawRow = Record<string, string>;

/** Decode CSV text already in memory. `source` only labels failures. */
export function decodeCsv<T>(
  text: string,
  source: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  log: Logger = childLogger({ module: 'sources' }),
): DecodeResult<T> {
  const parsed = Papa.parse<RawRow>(text, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim(),
  });

  // Structural problems (wrong field count, bad quoting) are keyed by data row
  const structural = new Map<number, string>();
  for (const e of parsed.errors) {
    if (e.row !== undefined && !structural.has(e.row)) structural.set(e.row, e.message);
  }

  const records: T[] = [];
  const failures: DecodeFailure[] = [];

  parsed.data.forEach((raw, i) => {
    const row = i + 1;
    const problem = structural.get(i);
    const result = problem === undefined ? schema.safeParse(raw) : null;

    if (result?.success) {
      records.push(result.data);
      return;
    }

    const detail = problem ?? (result ? result.error.issues.map(iss => `${iss.path.join('.') || 'row'}: ${iss.message}`).join('; ') : 'unreadable row');
    const err = new DecodeError(source, row, detail);
    log.warn({ source, row, detail }, err.message);
    failures.push({ source, row, message: detail });
  });

  return { records, failures };
}

export class CsvRecordProvider implements RecordProvider {
  private readonly log: Logger;

  constructor(log: Logger = childLogger({ module: 'sources' })) {
    this.log = log;
  }

  async readSaleRecords(source: string): Promise<DecodeResult<SaleRecord>> {
    return this.read(source, SaleRowSchema);
  }

  async readReferenceRecords(source: string): Promise<DecodeResult<ReferenceRecord>> {
    return this.read(source, ReferenceRowSchema);
  }

  private async read<T>(source: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<DecodeResult<T>> {
    let text: string;
    try {
      text = await readFile(source, 'utf8');
    } catch (err) {
      throw new SourceReadError(source, err);
    }

    const result = decodeCsv(text, source, schema, this.log);
    this.log.info({ source, records: result.records.length, failures: result.failures.length }, 'Source decoded');
    return result;
  }
}
