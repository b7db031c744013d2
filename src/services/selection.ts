/**
 * selection.ts — Qualifier and scorer/ranker
 *
 * Both filters REJECT a series when they return true. Only series that pass
 * both are scored:
 *
 *   score = days(first, last) × saleCount × 0.5
 *
 * Ranking is descending by score; equal scores keep the grouper's property
 * order, so the selection never depends on map iteration order.
 */
import { compareProperties, daysBetween } from './helpers.ts';
import type { Datapoint, PropertySeries, SeriesFilter, SeriesFilters } from '../types.ts';

/** Predicate that rejects values below `threshold`, e.g. rejectBelow(3) for "fewer than 3 sales" */
export const rejectBelow = (threshold: number): SeriesFilter => (value) => value < threshold;

export const spanDays = (series: PropertySeries): number => daysBetween(series.first.date, series.last.date);

export function qualify(series: PropertySeries, filters: SeriesFilters): boolean {
  if (filters.lengthFilter(series.records.length)) return false;
  if (filters.dateDistanceFilter(spanDays(series))) return false;
  return true;
}

export function scoreSeries(series: PropertySeries): Datapoint {
  return {
    series,
    score: spanDays(series) * series.records.length * 0.5,
    first: series.first.date,
    last: series.last.date,
  };
}

/**
 * Sort by score descending and keep the top `limit`.
 * `undefined` keeps everything; zero or a negative limit selects nothing.
 */
export function rankDatapoints(datapoints: readonly Datapoint[], limit?: number): Datapoint[] {
  const ranked = [...datapoints].sort((a, b) =>
    b.score - a.score || compareProperties(a.series.property, b.series.property));
  if (limit === undefined) return ranked;
  return ranked.slice(0, Math.max(0, Math.floor(limit)));
}

export interface Selection {
  qualifying: number;
  selected: Datapoint[];
}

export function selectSeries(
  series: Iterable<PropertySeries>,
  filters: SeriesFilters,
  limit?: number,
): Selection {
  const datapoints: Datapoint[] = [];
  for (const s of series) {
    if (!qualify(s, filters)) continue;
    datapoints.push(scoreSeries(s));
  }
  return { qualifying: datapoints.length, selected: rankDatapoints(datapoints, limit) };
}
