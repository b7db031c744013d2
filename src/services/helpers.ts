// ═══════════════════════════════════════════════════════
// helpers.ts — Pure date and key utilities
// ═══════════════════════════════════════════════════════
import { differenceInCalendarDays, format, isValid, parseISO } from 'date-fns';
import type { PropertyKey } from '../types.ts';

/** Parse an ISO calendar date "2001-03-15" → Date (local midnight), or null */
export function parseDay(value: string | null | undefined): Date | null {
  if (!value) return null;
  const d = parseISO(value.trim());
  return isValid(d) ? d : null;
}

/** Whole calendar days from `a` to `b` */
export const daysBetween = (a: Date, b: Date): number => differenceInCalendarDays(b, a);

/** Reference lookup key "YYYY-MM" for the month a date falls in */
export const monthKey = (d: Date): string => format(d, 'yyyy-MM');

/** Month cell "YYYY-MM-01" */
export const formatMonth = (d: Date): string => format(d, 'yyyy-MM-01');

/** Day cell "YYYY-MM-DD" */
export const formatDay = (d: Date): string => format(d, 'yyyy-MM-dd');

/** Column label "<unit>, <building>" */
export const propertyLabel = (p: PropertyKey): string => `${p.unit}, ${p.building}`;

/** Exact grouping identity; unlike the label it cannot collide on embedded commas */
export const propertyId = (p: PropertyKey): string => JSON.stringify([p.unit, p.building]);

/** Code-unit string order, independent of locale */
export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Order by unit, then building */
export function compareProperties(a: PropertyKey, b: PropertyKey): number {
  return compareKeys(a.unit, b.unit) || compareKeys(a.building, b.building);
}

/** Format a percentage with a fixed number of decimals; -0 prints as 0 */
export function formatPercent(value: number, decimals: number): string {
  const s = value.toFixed(decimals);
  return /^-0(\.0*)?$/.test(s) ? s.slice(1) : s;
}
