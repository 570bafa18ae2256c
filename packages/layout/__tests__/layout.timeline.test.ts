import { describe, it, expect } from "vitest";
import { buildTimelineLayout, rowOf } from "../src/timeline-layout.js";
import { makeIntervals } from "../../records/__tests__/_helpers/intervals.js";

const scenario = makeIntervals([
  ["P1", "A", "2020-01-10", "2020-03-05"],
  ["P2", "A", "2020-02-01", "2020-02-20"],
]);

const staff = makeIntervals([
  ["P1", "A", "2020-01-01", "2020-02-01"], // 0
  ["P2", "A", "2020-01-01", "2020-02-01"], // 1
  ["P1", "A", "2020-03-01", "2020-04-01"], // 2
  ["P3", "B", "2020-01-01", "2020-02-01"], // 3
  ["P4", "C", "2020-05-01", "2020-06-01"], // 4
  ["P3", "C", "2020-01-01", "2020-02-01"], // 5
  ["P4", "C", "2020-07-01", "2020-08-01"], // 6
]);

const rowsByRecord = (layout: ReturnType<typeof buildTimelineLayout>) =>
  layout.rows.map((r) => [r.interval.record_index, r.row]);

describe("layout: buildTimelineLayout", () => {
  it("stacks one row per interval in arrival order", () => {
    const layout = buildTimelineLayout(scenario, ["A"]);
    expect(rowsByRecord(layout)).toEqual([
      [0, 0],
      [1, 1],
    ]);
    expect(layout.blocks).toEqual([
      {
        category: "A",
        order: 0,
        color_index: 0,
        first_row: 0,
        last_row: 1,
        row_count: 2,
        person_count: 2,
        anchor_row: 0.5,
      },
    ]);
    expect(layout.height).toBe(2);
  });

  it("keeps a person's intervals together and follows the caller's category order", () => {
    const layout = buildTimelineLayout(staff, ["B", "A"]);
    // B: row 0; gap of 2; A: P1 (0, 2) then P2 (1)
    expect(rowsByRecord(layout)).toEqual([
      [3, 0],
      [0, 3],
      [2, 4],
      [1, 5],
    ]);
    expect(layout.blocks.map((b) => [b.category, b.first_row, b.last_row, b.anchor_row])).toEqual([
      ["B", 0, 0, 0],
      ["A", 3, 5, 4],
    ]);
    expect(layout.height).toBe(6);
  });

  it("skips categories without intervals and adds no gap for them", () => {
    const layout = buildTimelineLayout(staff, ["A", "Z", "B"]);
    expect(layout.skipped_categories).toEqual(["Z"]);
    expect(layout.blocks.map((b) => [b.category, b.first_row, b.color_index])).toEqual([
      ["A", 0, 0],
      ["B", 5, 2],
    ]);
  });

  it("assigns unique rows and leaves at least two blank rows between blocks", () => {
    const layout = buildTimelineLayout(staff, ["C", "A", "B"]);
    const rows = layout.rows.map((r) => r.row);
    expect(new Set(rows).size).toBe(staff.length);

    for (let k = 1; k < layout.blocks.length; k++) {
      const prev = layout.blocks[k - 1];
      const cur = layout.blocks[k];
      expect(cur.first_row - prev.last_row - 1).toBeGreaterThanOrEqual(2);
    }

    for (const r of layout.rows) {
      const block = layout.blocks.find((b) => b.category === r.interval.category);
      expect(block && r.row >= block.first_row && r.row <= block.last_row).toBe(true);
    }
  });

  it("groups by first appearance, not alphabetically", () => {
    const layout = buildTimelineLayout(staff, ["C"]);
    // P4 appears first (record 4), so its two intervals precede P3's.
    expect(rowsByRecord(layout)).toEqual([
      [4, 0],
      [6, 1],
      [5, 2],
    ]);
    expect(layout.blocks[0].person_count).toBe(2);
  });

  it("honours a custom gap", () => {
    const layout = buildTimelineLayout(staff, ["A", "B"], { category_gap_rows: 0 });
    expect(layout.blocks.map((b) => b.first_row)).toEqual([0, 3]);
    expect(layout.height).toBe(4);
    expect(() => buildTimelineLayout(staff, ["A"], { category_gap_rows: -1 })).toThrow(
      "INVALID_CATEGORY_GAP: -1"
    );
  });

  it("is empty for an empty selection", () => {
    expect(buildTimelineLayout(staff, [])).toEqual({
      rows: [],
      blocks: [],
      height: 0,
      skipped_categories: [],
    });
  });

  it("looks up the row of a record", () => {
    const layout = buildTimelineLayout(staff, ["B", "A"]);
    expect(rowOf(layout, 2)).toBe(4);
    expect(rowOf(layout, 4)).toBeNull();
  });

  it("is idempotent", () => {
    const a = buildTimelineLayout(staff, ["C", "A", "B"]);
    const b = buildTimelineLayout(staff, ["C", "A", "B"]);
    expect(JSON.stringify(a)).toBe(JSON.stringify(b));
  });
});
