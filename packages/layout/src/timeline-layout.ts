import { assertSanitizedIntervals } from "../../records/src/assert.js";
import { filterByCategories, groupByCategory } from "../../records/src/categories.js";
import type { Interval } from "../../records/src/schema.js";
import { assignCategories, PALETTE_SIZE } from "./category-assignment.js";

export const CATEGORY_GAP_ROWS = 2;

export type LayoutRow = {
  row: number;
  interval: Interval;
};

export type CategoryBlock = {
  category: string;
  order: number;
  color_index: number;
  first_row: number;
  last_row: number;
  row_count: number;
  person_count: number;
  anchor_row: number; // label position: midpoint of the block
};

export type TimelineLayout = {
  rows: LayoutRow[]; // ascending by row
  blocks: CategoryBlock[];
  height: number; // rows used, trailing gap excluded
  skipped_categories: string[]; // selected but without intervals
};

export type TimelineLayoutOptions = {
  category_gap_rows?: number;
  palette_size?: number;
};

/**
 * One row per interval. Categories stack in the caller's order; inside a
 * category, each person's intervals sit together, persons in order of first
 * appearance. Non-empty blocks are separated by `category_gap_rows` blank rows.
 */
export function buildTimelineLayout(
  intervals: readonly Interval[],
  categories: readonly string[],
  opts: TimelineLayoutOptions = {}
): TimelineLayout {
  assertSanitizedIntervals(intervals);

  const gap = opts.category_gap_rows ?? CATEGORY_GAP_ROWS;
  if (!Number.isInteger(gap) || gap < 0) throw new Error(`INVALID_CATEGORY_GAP: ${gap}`);

  const assignments = assignCategories(categories, opts.palette_size ?? PALETTE_SIZE);
  const byCategory = groupByCategory(
    filterByCategories(
      intervals,
      assignments.map((a) => a.category)
    )
  );

  const rows: LayoutRow[] = [];
  const blocks: CategoryBlock[] = [];
  const skipped_categories: string[] = [];
  let next = 0;

  for (const a of assignments) {
    const list = byCategory.get(a.category);
    if (!list) {
      skipped_categories.push(a.category);
      continue;
    }

    if (blocks.length > 0) next += gap;
    const first_row = next;

    const byPerson = groupByPerson(list);
    for (const personIntervals of byPerson.values()) {
      for (const interval of personIntervals) rows.push({ row: next++, interval });
    }

    const last_row = next - 1;
    blocks.push({
      category: a.category,
      order: a.order,
      color_index: a.color_index,
      first_row,
      last_row,
      row_count: list.length,
      person_count: byPerson.size,
      anchor_row: (first_row + last_row) / 2,
    });
  }

  const lastBlock = blocks[blocks.length - 1];
  return {
    rows,
    blocks,
    height: lastBlock ? lastBlock.last_row + 1 : 0,
    skipped_categories,
  };
}

export function rowOf(layout: TimelineLayout, record_index: number): number | null {
  const hit = layout.rows.find((r) => r.interval.record_index === record_index);
  return hit ? hit.row : null;
}

// Map keeps insertion order, i.e. first-appearance order of persons.
function groupByPerson(intervals: readonly Interval[]): Map<string, Interval[]> {
  const m = new Map<string, Interval[]>();
  for (const i of intervals) {
    const list = m.get(i.person_id) ?? [];
    list.push(i);
    m.set(i.person_id, list);
  }
  return m;
}
