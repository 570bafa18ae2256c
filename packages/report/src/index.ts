// ---------- Report pipeline (stable public API) ----------
export { buildContractTimelineReport } from "./report.js";

export type {
  ContractTimelineReport,
  EmptySelectionReason,
  EmptySelectionReport,
  OkReport,
  ReportDiagnostics,
  ReportOptions,
  ReportSelection,
} from "./report.js";

export { renderReportText } from "./render-text.js";

// ---------- Core components ----------
export * from "../../records/src/index.js";
export * from "../../calendar/src/index.js";
export * from "../../activity/src/index.js";
export * from "../../layout/src/index.js";
