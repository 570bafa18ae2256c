import { spanExtent, type DatedSpan } from "../../calendar/src/month-grid.js";
import { filterByCategories, groupByCategory, normalizeSelection } from "../../records/src/categories.js";
import type { Interval } from "../../records/src/schema.js";

export type CategorySummary = {
  category: string;
  contracts: number;
  persons: number;
  mean_duration_days: number | null; // 1 decimal; null when no contracts
};

export type SelectionSummary = {
  total_contracts: number;
  total_persons: number;
  categories_selected: number;
  period: DatedSpan | null;
  categories: CategorySummary[];
};

export function summarizeCategories(
  intervals: readonly Interval[],
  categories: readonly string[]
): CategorySummary[] {
  const byCategory = groupByCategory(intervals);

  return normalizeSelection(categories).map((category) => {
    const list = byCategory.get(category) ?? [];
    const total = list.reduce((s, i) => s + i.duration_days, 0);
    return {
      category,
      contracts: list.length,
      persons: new Set(list.map((i) => i.person_id)).size,
      mean_duration_days: list.length ? round1(total / list.length) : null,
    };
  });
}

export function summarizeSelection(
  intervals: readonly Interval[],
  categories: readonly string[]
): SelectionSummary {
  const selection = normalizeSelection(categories);
  const filtered = filterByCategories(intervals, selection);

  return {
    total_contracts: filtered.length,
    total_persons: new Set(filtered.map((i) => i.person_id)).size,
    categories_selected: selection.length,
    period: spanExtent(filtered),
    categories: summarizeCategories(filtered, selection),
  };
}

function round1(x: number): number {
  return Math.round(x * 10) / 10;
}
