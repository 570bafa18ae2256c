import type { Interval } from "./schema.js";

/** Distinct categories, sorted. This is the default selection. */
export function listCategories(intervals: readonly Interval[]): string[] {
  return [...new Set(intervals.map((i) => i.category))].sort((a, b) => a.localeCompare(b));
}

/**
 * Caller selection -> ordered, de-duplicated list. Entries are trimmed the
 * same way categories are at sanitization; blanks are dropped. First
 * occurrence wins, order is otherwise untouched.
 */
export function normalizeSelection(categories: readonly string[]): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const raw of categories) {
    const c = raw.trim();
    if (c === "" || seen.has(c)) continue;
    seen.add(c);
    out.push(c);
  }
  return out;
}

export function filterByCategories(
  intervals: readonly Interval[],
  categories: readonly string[]
): Interval[] {
  const wanted = new Set(normalizeSelection(categories));
  return intervals.filter((i) => wanted.has(i.category));
}

export function groupByCategory(intervals: readonly Interval[]): Map<string, Interval[]> {
  const m = new Map<string, Interval[]>();
  for (const i of intervals) {
    const list = m.get(i.category) ?? [];
    list.push(i);
    m.set(i.category, list);
  }
  return m;
}
