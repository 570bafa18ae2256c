// examples/run-layout.ts
import { readFileSync } from "node:fs";
import {
  buildTimelineLayout,
  sanitizeRecords,
  yearBoundaries,
  spanExtent,
} from "../packages/report/src/index.js";

function assert(cond: unknown, msg: string): asserts cond {
  if (!cond) throw new Error(msg);
}

const raw: unknown = JSON.parse(
  readFileSync(new URL("./records/sample-contracts.json", import.meta.url), "utf-8")
);
assert(Array.isArray(raw), "sample-contracts.json must hold an array");

const { intervals, rejected } = sanitizeRecords(raw);
for (const r of rejected) console.error(`- rejected #${r.record_index} ${r.reason}: ${r.message}`);

const layout = buildTimelineLayout(intervals, ["TECNICO", "ENFERMERA", "CELADOR"]);

for (const { row, interval } of layout.rows) {
  console.log(
    `${String(row).padStart(3)}  ${interval.category.padEnd(10)} ${interval.person_id}  ${interval.start} .. ${interval.end}`
  );
}

const rows = new Set(layout.rows.map((r) => r.row));
assert(rows.size === layout.rows.length, "rows must be unique");

const extent = spanExtent(intervals);
console.log(`\nheight=${layout.height} year_markers=${yearBoundaries(extent?.start, extent?.end).join(",")}`);
