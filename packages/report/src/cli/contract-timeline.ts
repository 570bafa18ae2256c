#!/usr/bin/env node
// packages/report/src/cli/contract-timeline.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";

import { listCategories } from "../../../records/src/categories.js";
import { diffIntervalSets, fingerprintIntervals } from "../../../records/src/fingerprint.js";
import { sanitizeRecords } from "../../../records/src/sanitize.js";
import type { Interval } from "../../../records/src/schema.js";
import { renderReportText } from "../render-text.js";
import { buildContractTimelineReport } from "../report.js";

export type CliIo = {
  readFile: (filePath: string) => string;
  stdout: (s: string) => void;
  stderr: (s: string) => void;
};

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_BAD_INPUT = 2;
export const EXIT_DIFFERENT = 3;

// A bare array of rows, or `{ "records": [...] }`.
const RecordsFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ records: z.array(z.unknown()) }),
]);

export function usage(): string {
  return `contract-timeline - active contracts per month and timeline layout

Usage:
  contract-timeline --help
  contract-timeline version

  contract-timeline report <records.json> [--category <name>]... [--json]
  contract-timeline categories <records.json>
  contract-timeline fingerprint <records.json> [<other.json>]

Input: a JSON array of rows with DNI, CATEGORIA, Falta, Fbaja
(or an object with a "records" array).

Examples:
  contract-timeline report contracts.json
  contract-timeline report contracts.json --category ENFERMERA --category CELADOR --json
  contract-timeline fingerprint january.json february.json

fingerprint prints the SHA-256 of the accepted contract set. With two files it
lists the contracts found in only one of them and exits 3 when they differ.
`;
}

// -------------------- argv parsing --------------------

export function getFlagValues(args: readonly string[], flag: string): string[] {
  const out: string[] = [];
  args.forEach((a, i) => {
    if (a !== flag) return;
    const v = args[i + 1];
    if (v !== undefined && !v.startsWith("--")) out.push(v);
  });
  return out;
}

// -------------------- file helpers --------------------

type LoadResult = { ok: true; records: unknown[] } | { ok: false; message: string };

export function loadRecords(filePath: string, io: CliIo): LoadResult {
  let raw: string;
  try {
    raw = io.readFile(filePath);
  } catch (err) {
    return { ok: false, message: `cannot read ${filePath}: ${errorMessage(err)}` };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, message: `"${filePath}" is not valid JSON. First 120 chars: ${raw.slice(0, 120)}` };
  }

  const parsed = RecordsFileSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, message: `"${filePath}" must hold an array of records` };
  }
  return { ok: true, records: Array.isArray(parsed.data) ? parsed.data : parsed.data.records };
}

// -------------------- commands --------------------

function cmdReport(records: unknown[], categories: string[] | undefined, asJson: boolean, io: CliIo): number {
  const report = buildContractTimelineReport(records, { categories });
  io.stdout(asJson ? JSON.stringify(report, null, 2) + "\n" : renderReportText(report));
  return EXIT_OK;
}

function cmdCategories(records: unknown[], io: CliIo): number {
  const { intervals, rejected_count } = sanitizeRecords(records);
  for (const c of listCategories(intervals)) io.stdout(c + "\n");
  if (rejected_count > 0) io.stderr(`[contract-timeline] ${rejected_count} record(s) rejected\n`);
  return EXIT_OK;
}

function cmdFingerprint(
  left: { file: string; records: unknown[] },
  right: { file: string; records: unknown[] } | null,
  io: CliIo
): number {
  const a = sanitizeRecords(left.records).intervals;
  if (!right) {
    io.stdout(fingerprintIntervals(a) + "\n");
    return EXIT_OK;
  }

  const diff = diffIntervalSets(a, sanitizeRecords(right.records).intervals);
  io.stdout(`${diff.left_fingerprint}  ${left.file}\n${diff.right_fingerprint}  ${right.file}\n`);
  if (diff.same) {
    io.stdout("same contract set\n");
    return EXIT_OK;
  }
  for (const i of diff.only_left) io.stdout(`- only in ${left.file}: ${describeInterval(i)}\n`);
  for (const i of diff.only_right) io.stdout(`- only in ${right.file}: ${describeInterval(i)}\n`);
  return EXIT_DIFFERENT;
}

function describeInterval(i: Interval): string {
  return `#${i.record_index} ${i.person_id} ${i.category} ${i.start}..${i.end}`;
}

// -------------------- entry --------------------

export function runCli(args: readonly string[], io: CliIo): number {
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.stdout(usage());
    return EXIT_OK;
  }

  const cmd = args[0];

  if (cmd === "version") {
    io.stdout("contract-timeline cli v1\n");
    return EXIT_OK;
  }

  if (cmd !== "report" && cmd !== "categories" && cmd !== "fingerprint") {
    io.stderr(`Unknown command: ${cmd}\n\n${usage()}`);
    return EXIT_USAGE;
  }

  const file = args[1];
  if (!file || file.startsWith("--")) {
    io.stderr(`Missing file.\n\n${usage()}`);
    return EXIT_USAGE;
  }

  const loaded = loadRecords(file, io);
  if (!loaded.ok) {
    io.stderr(`[contract-timeline] ${loaded.message}\n`);
    return EXIT_BAD_INPUT;
  }

  if (cmd === "fingerprint") {
    const other = args[2];
    if (other === undefined || other.startsWith("--")) {
      return cmdFingerprint({ file, records: loaded.records }, null, io);
    }
    const second = loadRecords(other, io);
    if (!second.ok) {
      io.stderr(`[contract-timeline] ${second.message}\n`);
      return EXIT_BAD_INPUT;
    }
    return cmdFingerprint({ file, records: loaded.records }, { file: other, records: second.records }, io);
  }

  // No --category flag means "all categories", as opposed to an empty list.
  const picked = getFlagValues(args, "--category");
  const categories = picked.length ? picked : undefined;

  if (cmd === "categories") return cmdCategories(loaded.records, io);
  return cmdReport(loaded.records, categories, args.includes("--json"), io);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export const nodeIo: CliIo = {
  readFile: (filePath) => fs.readFileSync(path.resolve(process.cwd(), filePath), "utf8"),
  stdout: (s) => process.stdout.write(s),
  stderr: (s) => process.stderr.write(s),
};

// Entrypoint: direct `node`/`tsx` runs and the npm bin symlink.
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  try {
    process.exitCode = runCli(process.argv.slice(2), nodeIo);
  } catch (err) {
    console.error(`[contract-timeline] ${errorMessage(err)}`);
    process.exitCode = EXIT_BAD_INPUT;
  }
}
