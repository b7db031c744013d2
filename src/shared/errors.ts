/**
 * shared/errors.ts — Pipeline error hierarchy
 *
 * Every failure names the stage it came from and the key (property, region,
 * date) that caused it. Only DecodeError is recoverable: sources report it
 * as a DecodeFailure and keep reading.
 */
import { format } from 'date-fns';

export type PipelineStage =
  | 'config'
  | 'read'
  | 'decode'
  | 'date-range'
  | 'reference-join'
  | 'percentage-change'
  | 'sink';

export type ErrorContext = Record<string, string | number>;

export class PipelineError extends Error {
  code: string;
  stage: PipelineStage;
  context: ErrorContext;
  constructor(message: string, code: string, stage: PipelineStage, context: ErrorContext = {}, options?: ErrorOptions) {
    super(`[${stage}] ${message}`, options);
    this.name = 'PipelineError';
    this.code = code;
    this.stage = stage;
    this.context = context;
  }
}

const day = (date: Date): string => format(date, 'yyyy-MM-dd');

export class DecodeError extends PipelineError {
  constructor(source: string, row: number, detail: string) {
    super(`${source} row ${row}: ${detail}`, 'DECODE_ERROR', 'decode', { source, row });
    this.name = 'DecodeError';
  }
}

export class SourceReadError extends PipelineError {
  constructor(source: string, cause: unknown) {
    super(`cannot read ${source}: ${cause instanceof Error ? cause.message : String(cause)}`, 'SOURCE_READ_ERROR', 'read', { source }, { cause });
    this.name = 'SourceReadError';
  }
}

export class EmptySelectionError extends PipelineError {
  constructor() {
    super('no property series selected; the date range is undefined', 'EMPTY_SELECTION', 'date-range');
    this.name = 'EmptySelectionError';
  }
}

export class MissingReferenceKeyError extends PipelineError {
  constructor(property: string, region: string, date: Date) {
    const month = format(date, 'yyyy-MM');
    super(
      `no ${region} reference snapshot for ${month} (sale of "${property}" on ${day(date)})`,
      'MISSING_REFERENCE_KEY', 'reference-join', { property, region, date: day(date), month },
    );
    this.name = 'MissingReferenceKeyError';
  }
}

export type DivisorField = 'pricePaid' | 'averagePriceFlats';

export class DivisionByZeroError extends PipelineError {
  constructor(property: string, region: string, date: Date, field: DivisorField) {
    super(
      `previous ${field} is zero for "${property}" v ${region} at ${day(date)}`,
      'DIVISION_BY_ZERO', 'percentage-change', { property, region, date: day(date), field },
    );
    this.name = 'DivisionByZeroError';
  }
}

export class SinkWriteError extends PipelineError {
  constructor(destination: string, cause: unknown) {
    super(`cannot write ${destination}: ${cause instanceof Error ? cause.message : String(cause)}`, 'SINK_WRITE_ERROR', 'sink', { destination }, { cause });
    this.name = 'SinkWriteError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'CONFIG_ERROR', 'config', context);
    this.name = 'ConfigError';
  }
}
