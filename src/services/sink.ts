/**
 * sink.ts — Writes a pivot table as CSV: header row, then every row verbatim.
 */
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { stringify } from 'csv-stringify/sync';
import { SinkWriteError } from '../shared/errors.ts';
import { childLogger, type Logger } from '../shared/logger.ts';
import type { TableData, TableSink } from '../types.ts';

export function tableToCsv(table: TableData): string {
  return stringify([table.labels, ...table.rows]);
}

export class CsvTableSink implements TableSink {
  private readonly log: Logger;

  constructor(log: Logger = childLogger({ module: 'sink' })) {
    this.log = log;
  }

  async writeTable(table: TableData, destination: string): Promise<void> {
    try {
      await mkdir(dirname(destination), { recursive: true });
      await writeFile(destination, tableToCsv(table), 'utf8');
    } catch (err) {
      throw new SinkWriteError(destination, err);
    }
    this.log.info({ destination, columns: table.labels.length, rows: table.rows.length }, 'Table written');
  }
}
