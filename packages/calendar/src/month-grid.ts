import { addMonths, floorToMonth, maxDate, minDate, type IsoDate } from "./dates.js";

export type DatedSpan = {
  readonly start: IsoDate;
  readonly end: IsoDate;
};

/**
 * First-of-month sampling points from floor(min start) to floor(max end),
 * inclusive. Empty input -> empty grid.
 */
export function buildMonthGrid(spans: readonly DatedSpan[]): IsoDate[] {
  const extent = spanExtent(spans);
  if (!extent) return [];
  return buildMonthGridBetween(extent.start, extent.end);
}

/** Returns [] when `min > max` (degenerate range, not an error). */
export function buildMonthGridBetween(min: IsoDate, max: IsoDate): IsoDate[] {
  const first = floorToMonth(min);
  const last = floorToMonth(max);
  if (first > last) return [];

  const months: IsoDate[] = [];
  for (let m = first; m <= last; m = addMonths(m, 1)) months.push(m);
  return months;
}

export function spanExtent(spans: readonly DatedSpan[]): DatedSpan | null {
  const start = minDate(spans.map((s) => s.start));
  const end = maxDate(spans.map((s) => s.end));
  if (start === null || end === null) return null;
  return { start, end };
}
