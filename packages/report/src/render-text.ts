import type { ContractTimelineReport } from "./report.js";

/** Plain-text rendering of a report for terminals and logs. */
export function renderReportText(report: ContractTimelineReport): string {
  const lines: string[] = [];
  const d = report.diagnostics;

  lines.push(`Records: ${d.total_records} (accepted ${d.accepted}, rejected ${d.rejected_count})`);
  for (const r of d.rejected) {
    lines.push(`- #${r.record_index} ${r.reason}: ${r.message}`);
  }

  if (report.status === "EMPTY_SELECTION") {
    lines.push(
      report.reason === "NO_CATEGORIES_SELECTED"
        ? "Nothing to show: no categories selected."
        : "Nothing to show: no contracts match the selected categories."
    );
    return lines.join("\n") + "\n";
  }

  const s = report.summary;
  lines.push(
    `Contracts: ${s.total_contracts}  Persons: ${s.total_persons}  Categories: ${s.categories_selected}`
  );
  if (s.period) lines.push(`Period: ${s.period.start} .. ${s.period.end}`);

  lines.push("", "Categories");
  for (const c of s.categories) {
    const mean = c.mean_duration_days === null ? "-" : String(c.mean_duration_days);
    lines.push(`- ${c.category}: contracts=${c.contracts} persons=${c.persons} mean_duration_days=${mean}`);
  }

  lines.push("", "Active contracts by month");
  const withData = report.activity.series.filter((x) => x.has_data);
  report.activity.months.forEach((m, idx) => {
    const cells = withData.map((x) => `${x.category}=${x.counts[idx]}`);
    lines.push(`${m}  ${[...cells, `total=${report.activity.total_by_month[idx]}`].join(" ")}`);
  });

  lines.push("", `Timeline (height ${report.layout.height})`);
  for (const b of report.layout.blocks) {
    lines.push(
      `- ${b.category}: rows ${b.first_row}-${b.last_row} persons=${b.person_count} anchor=${b.anchor_row} color=${b.color_index}`
    );
  }

  lines.push(
    "",
    `Year boundaries (activity): ${formatYears(report.activity_year_boundaries)}`,
    `Year boundaries (timeline): ${formatYears(report.timeline_year_boundaries)}`
  );

  return lines.join("\n") + "\n";
}

function formatYears(years: readonly number[]): string {
  return years.length ? years.join(", ") : "-";
}
