import {
  computeMonthlyActivity,
  type ActivityStrategy,
  type MonthlyActivity,
} from "../../activity/src/monthly-activity.js";
import { summarizeSelection, type SelectionSummary } from "../../activity/src/summary.js";
import { spanExtent } from "../../calendar/src/month-grid.js";
import { yearBoundaries } from "../../calendar/src/year-boundaries.js";
import { assignCategories, type CategoryAssignment } from "../../layout/src/category-assignment.js";
import {
  buildTimelineLayout,
  type TimelineLayout,
  type TimelineLayoutOptions,
} from "../../layout/src/timeline-layout.js";
import {
  filterByCategories,
  listCategories,
  normalizeSelection,
} from "../../records/src/categories.js";
import { fingerprintIntervals } from "../../records/src/fingerprint.js";
import { sanitizeRecords } from "../../records/src/sanitize.js";
import type {
  RecordRejection,
  RejectionReason,
  SanitizeOptions,
} from "../../records/src/schema.js";

export type ReportOptions = SanitizeOptions &
  TimelineLayoutOptions & {
    // Omitted -> every category found in the data, sorted.
    categories?: readonly string[];
    strategy?: ActivityStrategy;
  };

export type ReportDiagnostics = {
  total_records: number;
  accepted: number;
  rejected_count: number;
  rejected_by_reason: Record<RejectionReason, number>;
  rejected: RecordRejection[];
  // Fingerprint of every accepted interval, before selection.
  fingerprint: string;
  notes: string[];
};

export type ReportSelection = {
  available: string[];
  selected: string[];
  defaulted: boolean;
  assignments: CategoryAssignment[];
};

export type EmptySelectionReason = "NO_CATEGORIES_SELECTED" | "NO_MATCHING_INTERVALS";

export type OkReport = {
  status: "OK";
  diagnostics: ReportDiagnostics;
  selection: ReportSelection;
  activity: MonthlyActivity;
  activity_year_boundaries: number[];
  layout: TimelineLayout;
  timeline_year_boundaries: number[];
  summary: SelectionSummary;
};

export type EmptySelectionReport = {
  status: "EMPTY_SELECTION";
  reason: EmptySelectionReason;
  diagnostics: ReportDiagnostics;
  selection: ReportSelection;
};

export type ContractTimelineReport = OkReport | EmptySelectionReport;

/**
 * sanitize -> select -> {activity, layout} -> year markers -> summary.
 *
 * Pure: equal input gives a byte-identical report.
 * "Nothing to show" comes back as EMPTY_SELECTION, never as an OK report with
 * zero-length series.
 */
export function buildContractTimelineReport(
  raw: readonly unknown[],
  opts: ReportOptions = {}
): ContractTimelineReport {
  const sanitized = sanitizeRecords(raw, opts);

  const available = listCategories(sanitized.intervals);
  const defaulted = opts.categories === undefined;
  const selected = normalizeSelection(opts.categories ?? available);

  const selection: ReportSelection = {
    available,
    selected,
    defaulted,
    assignments: assignCategories(selected, opts.palette_size),
  };

  const diagnostics: ReportDiagnostics = {
    total_records: raw.length,
    accepted: sanitized.intervals.length,
    rejected_count: sanitized.rejected_count,
    rejected_by_reason: sanitized.rejected_by_reason,
    rejected: sanitized.rejected,
    fingerprint: fingerprintIntervals(sanitized.intervals),
    notes: [...sanitized.notes],
  };

  if (selected.length === 0 && !defaulted) {
    return emptyReport("NO_CATEGORIES_SELECTED", diagnostics, selection);
  }

  const filtered = filterByCategories(sanitized.intervals, selected);
  if (filtered.length === 0) {
    return emptyReport("NO_MATCHING_INTERVALS", diagnostics, selection);
  }

  const activity = computeMonthlyActivity(filtered, selected, { strategy: opts.strategy });
  const layout = buildTimelineLayout(filtered, selected, opts);

  // Each view marks years from its own extent.
  const firstMonth = activity.months[0];
  const lastMonth = activity.months[activity.months.length - 1];
  const extent = spanExtent(layout.rows.map((r) => r.interval));

  if (layout.skipped_categories.length) {
    diagnostics.notes.push(`No intervals for: ${layout.skipped_categories.join(", ")}`);
  }

  return {
    status: "OK",
    diagnostics,
    selection,
    activity,
    activity_year_boundaries: yearBoundaries(firstMonth, lastMonth),
    layout,
    timeline_year_boundaries: yearBoundaries(extent?.start, extent?.end),
    summary: summarizeSelection(filtered, selected),
  };
}

function emptyReport(
  reason: EmptySelectionReason,
  diagnostics: ReportDiagnostics,
  selection: ReportSelection
): EmptySelectionReport {
  return { status: "EMPTY_SELECTION", reason, diagnostics, selection };
}
