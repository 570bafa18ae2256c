import { describe, it, expect } from "vitest";
import { renderReportText } from "../src/render-text.js";
import { buildContractTimelineReport } from "../src/report.js";
import { RECORDS } from "./_fixtures.js";

const rejectionLine = "- #3 NEGATIVE_DURATION: End 2021-04-01 is before start 2021-05-01 (-30 days)";

describe("report: renderReportText", () => {
  it("renders totals, categories, monthly counts, blocks and year markers", () => {
    const lines = renderReportText(buildContractTimelineReport(RECORDS)).split("\n");

    expect(lines.slice(0, 4)).toEqual([
      "Records: 4 (accepted 3, rejected 1)",
      rejectionLine,
      "Contracts: 3  Persons: 3  Categories: 2",
      "Period: 2020-01-10 .. 2021-02-10",
    ]);
    expect(lines).toContain("- A: contracts=2 persons=2 mean_duration_days=37");
    expect(lines).toContain("- B: contracts=1 persons=1 mean_duration_days=57");
    expect(lines).toContain("2020-01-01  A=0 B=0 total=0");
    expect(lines).toContain("2020-02-01  A=2 B=0 total=2");
    expect(lines).toContain("2021-02-01  A=0 B=1 total=1");
    expect(lines).toContain("Timeline (height 5)");
    expect(lines).toContain("- A: rows 0-1 persons=2 anchor=0.5 color=0");
    expect(lines).toContain("- B: rows 4-4 persons=1 anchor=4 color=1");
    expect(lines.slice(-3)).toEqual([
      "Year boundaries (activity): 2021",
      "Year boundaries (timeline): 2021",
      "",
    ]);
  });

  it("renders a nothing-to-show notice for empty selections", () => {
    expect(renderReportText(buildContractTimelineReport(RECORDS, { categories: [] }))).toBe(
      ["Records: 4 (accepted 3, rejected 1)", rejectionLine, "Nothing to show: no categories selected.", ""].join("\n")
    );
    expect(renderReportText(buildContractTimelineReport(RECORDS, { categories: ["Z"] }))).toContain(
      "Nothing to show: no contracts match the selected categories.\n"
    );
  });
});
