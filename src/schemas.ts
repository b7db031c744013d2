// ═══════════════════════════════════════════════════════
// Zod Schemas — Row decoding for every CSV source and the
// pipeline config file
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import { parseDay } from './services/helpers.ts';
import type { ReferenceRecord, SaleRecord } from './types.ts';

// ── Cell parsers ──

const blankToUndefined = (v: unknown): unknown =>
  typeof v === 'string' && v.trim() === '' ? undefined : v;

export const DayCell = z.string().transform((v, ctx) => {
  const d = parseDay(v);
  if (!d) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date "${v}"` });
    return z.NEVER;
  }
  return d;
});

export const IntCell = z.string().trim().regex(/^-?\d+$/, 'expected an integer').transform(Number);

export const FloatCell = z.preprocess(blankToUndefined, z.coerce.number().finite());

export const OptionalFloatCell = z.preprocess(blankToUndefined, z.coerce.number().finite().optional());

// ── Price paid data (one sale per row) ──

export const SaleRowSchema = z.object({
  deed_date: DayCell,
  saon: z.string(),
  paon: z.string(),
  street: z.string().default(''),
  price_paid: IntCell,
}).transform((row): SaleRecord => ({
  date: row.deed_date,
  pricePaid: row.price_paid,
  property: { unit: row.saon, building: row.paon },
  estate: row.street,
}));

export type SaleRow = z.input<typeof SaleRowSchema>;

// ── UK HPI style reference rows (one region-month per row) ──

export const ReferenceRowSchema = z.object({
  'Name': z.string().min(1),
  'Pivotable date': DayCell,
  'Average price All property types': IntCell,
  'Average price Flats and maisonettes': IntCell,
  'House price index All property types': FloatCell,
  'House price index Flats and maisonettes': FloatCell,
  'Percentage change (monthly) All property types': OptionalFloatCell,
  'Percentage change (yearly) All property types': OptionalFloatCell,
  'Percentage change (monthly) Flats and maisonettes': OptionalFloatCell,
  'Percentage change (yearly) Flats and maisonettes': OptionalFloatCell,
  'Sales volume': OptionalFloatCell,
}).transform((row): ReferenceRecord => ({
  region: row['Name'],
  time: row['Pivotable date'],
  averagePriceAll: row['Average price All property types'],
  averagePriceFlats: row['Average price Flats and maisonettes'],
  hpiAll: row['House price index All property types'],
  hpiFlats: row['House price index Flats and maisonettes'],
  percentageChangeMonthlyAll: row['Percentage change (monthly) All property types'],
  percentageChangeYearlyAll: row['Percentage change (yearly) All property types'],
  percentageChangeMonthlyFlats: row['Percentage change (monthly) Flats and maisonettes'],
  percentageChangeYearlyFlats: row['Percentage change (yearly) Flats and maisonettes'],
  salesVolume: row['Sales volume'],
}));

export type ReferenceRow = z.input<typeof ReferenceRowSchema>;

// ── Pipeline config file ──

export const RegionConfigSchema = z.object({
  name: z.string().min(1),
  source: z.string().min(1),
});

export const EstateConfigSchema = z.object({
  name: z.string().min(1),
  sales: z.string().min(1),
  minSales: z.number().int().min(0).default(3),
  minSpanDays: z.number().int().min(0).default(7300),   // ~20 years
  limit: z.number().int().optional(),
  output: z.object({
    prices: z.string().min(1),
    percentageChange: z.string().min(1),
  }),
});

export const PipelineConfigSchema = z.object({
  regions: z.array(RegionConfigSchema).default([]),
  estates: z.array(EstateConfigSchema).min(1),
});

export type RegionConfig = z.infer<typeof RegionConfigSchema>;
export type EstateConfig = z.infer<typeof EstateConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
