import { describe, it, expect } from "vitest";
import {
  computeMonthlyActivity,
  countActiveByScan,
  countActiveBySweep,
} from "../src/monthly-activity.js";
import { makeIntervals } from "../../records/__tests__/_helpers/intervals.js";

const scenario = makeIntervals([
  ["P1", "A", "2020-01-10", "2020-03-05"],
  ["P2", "A", "2020-02-01", "2020-02-20"],
]);

const mixed = makeIntervals([
  [1, "A", "2019-11-20", "2020-04-01"],
  [2, "A", "2020-01-01", "2020-01-31"],
  [3, "B", "2019-12-01", "2020-12-01"],
  [1, "A", "2020-04-01", "2020-04-01"],
  [4, "B", "2020-02-15", "2020-03-01"],
  [5, "C", "2020-06-01", "2020-09-30"],
  [2, "A", "2020-05-02", "2020-07-01"],
  [6, "B", "2020-03-01", "2020-03-01"],
  [7, "C", "2020-01-05", "2020-01-25"],
  [3, "A", "2019-11-01", "2021-01-01"],
]);

describe("activity: computeMonthlyActivity", () => {
  it("samples containment on the first of each month", () => {
    const r = computeMonthlyActivity(scenario, ["A"]);
    expect(r.months).toEqual(["2020-01-01", "2020-02-01", "2020-03-01"]);
    // P1 starts on 2020-01-10, after the January sampling point.
    expect(r.series).toEqual([
      { category: "A", months: r.months, counts: [0, 2, 1], has_data: true },
    ]);
    expect(r.total_by_month).toEqual([0, 2, 1]);
  });

  it("counts intervals that start or end exactly on a sampling point", () => {
    const r = computeMonthlyActivity(mixed, ["B"]);
    // grid 2019-12 .. 2020-12; 3 covers all, 4 covers 03-01, 6 is exactly 03-01
    expect(r.series[0].counts.slice(0, 5)).toEqual([1, 1, 1, 3, 1]);
    expect(r.series[0].counts[r.months.length - 1]).toBe(1);
  });

  it("never counts an interval that lies between two sampling points", () => {
    const r = computeMonthlyActivity(makeIntervals([[1, "X", "2020-01-05", "2020-01-25"]]), ["X"]);
    expect(r.months).toEqual(["2020-01-01"]);
    expect(r.series[0].counts).toEqual([0]);
  });

  it("gives the same counts with scan and sweep", () => {
    const sweep = computeMonthlyActivity(mixed, ["A", "B", "C"], { strategy: "sweep" });
    const scan = computeMonthlyActivity(mixed, ["A", "B", "C"], { strategy: "scan" });
    expect(sweep).toEqual(scan);
  });

  it("sums per-category counts to the count over the union", () => {
    const r = computeMonthlyActivity(mixed, ["A", "C"]);
    const union = mixed.filter((i) => i.category === "A" || i.category === "C");
    expect(r.total_by_month).toEqual(countActiveByScan(union, r.months));
  });

  it("returns an empty series for a selected category without data", () => {
    const r = computeMonthlyActivity(scenario, ["A", "Z"]);
    expect(r.series[1]).toEqual({ category: "Z", months: [], counts: [], has_data: false });
    expect(r.total_by_month).toEqual([0, 2, 1]);
  });

  it("keeps the caller's category order and drops duplicates", () => {
    const r = computeMonthlyActivity(mixed, ["C", "A", "C"]);
    expect(r.series.map((s) => s.category)).toEqual(["C", "A"]);
  });

  it("returns empty results for an empty selection", () => {
    expect(computeMonthlyActivity(mixed, [])).toEqual({ months: [], series: [], total_by_month: [] });
  });

  it("samples on a caller-provided grid", () => {
    const r = computeMonthlyActivity(scenario, ["A"], { months: ["2020-02-01"] });
    expect(r.series[0].counts).toEqual([2]);
  });

  it("is idempotent", () => {
    const a = computeMonthlyActivity(mixed, ["A", "B", "C"]);
    const b = computeMonthlyActivity(mixed, ["A", "B", "C"]);
    expect(JSON.stringify(a)).toBe(JSON.stringify(b));
  });

  it("refuses intervals that did not come out of the sanitizer", () => {
    const forged = [{ ...scenario[0], duration_days: 1 }];
    expect(() => computeMonthlyActivity(forged, ["A"])).toThrow(/^UNSANITIZED_INTERVAL/);
  });
});

describe("activity: count strategies", () => {
  it("requires an ascending grid for the sweep", () => {
    const months = ["2020-02-01", "2020-01-01"];
    expect(countActiveByScan(scenario, months)).toEqual([2, 0]);
    expect(() => countActiveBySweep(scenario, months)).toThrow(
      "MONTHS_NOT_ASCENDING: 2020-02-01 then 2020-01-01"
    );
  });

  it("counts every interval active at each point", () => {
    const months = ["2019-11-01", "2020-01-01", "2020-04-01", "2020-07-01", "2021-01-01"];
    expect(countActiveBySweep(mixed, months)).toEqual(countActiveByScan(mixed, months));
    expect(countActiveBySweep(mixed, months)).toEqual([1, 4, 4, 4, 1]);
  });
});
