import type { IsoDate } from "../../calendar/src/dates.js";
import { buildMonthGrid } from "../../calendar/src/month-grid.js";
import { assertSanitizedIntervals } from "../../records/src/assert.js";
import {
  filterByCategories,
  groupByCategory,
  normalizeSelection,
} from "../../records/src/categories.js";
import type { Interval } from "../../records/src/schema.js";
import { MinHeap } from "./min-heap.js";

export type CategoryActivitySeries = {
  category: string;
  months: IsoDate[];
  counts: number[]; // parallel to months
  has_data: boolean;
};

export type MonthlyActivity = {
  months: IsoDate[];
  series: CategoryActivitySeries[]; // selection order
  total_by_month: number[];
};

export type ActivityStrategy = "scan" | "sweep";

export type MonthlyActivityOptions = {
  // Sampling grid override; must be ascending. Defaults to the grid spanning
  // the selected categories' intervals.
  months?: readonly IsoDate[];
  strategy?: ActivityStrategy;
};

/**
 * Active-contract counts per selected category, sampled on the first day of
 * each month: an interval counts at `m` iff `start <= m <= end`.
 *
 * This is a point-in-time test, not a whole-month overlap. A contract that
 * runs 2020-01-05..2020-01-25 is never counted.
 */
export function computeMonthlyActivity(
  intervals: readonly Interval[],
  categories: readonly string[],
  opts: MonthlyActivityOptions = {}
): MonthlyActivity {
  assertSanitizedIntervals(intervals);

  const selection = normalizeSelection(categories);
  const filtered = filterByCategories(intervals, selection);
  const months = opts.months ? [...opts.months] : buildMonthGrid(filtered);
  const count = opts.strategy === "scan" ? countActiveByScan : countActiveBySweep;

  const byCategory = groupByCategory(filtered);

  const series: CategoryActivitySeries[] = selection.map((category) => {
    const list = byCategory.get(category);
    if (!list) return { category, months: [], counts: [], has_data: false };
    return { category, months: [...months], counts: count(list, months), has_data: true };
  });

  const total_by_month = months.map((_, idx) =>
    series.reduce((sum, s) => sum + (s.has_data ? s.counts[idx] : 0), 0)
  );

  return { months, series, total_by_month };
}

/** O(months × intervals). Reference implementation. */
export function countActiveByScan(
  intervals: readonly Interval[],
  months: readonly IsoDate[]
): number[] {
  return months.map((m) => intervals.filter((i) => i.start <= m && i.end >= m).length);
}

/**
 * Sort by start, keep a min-heap of end dates for the intervals already
 * started. Months must be ascending.
 */
export function countActiveBySweep(
  intervals: readonly Interval[],
  months: readonly IsoDate[]
): number[] {
  for (let k = 1; k < months.length; k++) {
    if (months[k] <= months[k - 1]) {
      throw new Error(`MONTHS_NOT_ASCENDING: ${months[k - 1]} then ${months[k]}`);
    }
  }

  const byStart = [...intervals].sort((a, b) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0));
  const ends = new MinHeap<IsoDate>((a, b) => a < b);
  let next = 0;

  return months.map((m) => {
    while (next < byStart.length && byStart[next].start <= m) {
      ends.push(byStart[next].end);
      next++;
    }
    for (let top = ends.peek(); top !== undefined && top < m; top = ends.peek()) ends.pop();
    return ends.size;
  });
}
