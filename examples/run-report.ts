// examples/run-report.ts
import { readFileSync } from "node:fs";
import { buildContractTimelineReport, renderReportText } from "../packages/report/src/index.js";

const raw: unknown = JSON.parse(
  readFileSync(new URL("./records/sample-contracts.json", import.meta.url), "utf-8")
);
if (!Array.isArray(raw)) throw new Error("sample-contracts.json must hold an array");

const report = buildContractTimelineReport(raw, { categories: ["ENFERMERA", "CELADOR", "TECNICO"] });

process.stdout.write(renderReportText(report));
console.log(`\nfingerprint=${report.diagnostics.fingerprint}`);
