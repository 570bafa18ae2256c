import { z } from "zod";
import {
  formatYmd,
  fromEpochDay,
  fromJsDate,
  isValidYmd,
  type IsoDate,
} from "../../calendar/src/dates.js";

/* ------------------------------------------------------------------ */
/*                             Primitives                             */
/* ------------------------------------------------------------------ */

// 1899-12-30 is day 0 of the spreadsheet (1900) date system.
const EXCEL_EPOCH_OFFSET = 25_569;
// Serials below 61 sit before the system's phantom 1900-02-29.
const MIN_EXCEL_SERIAL = 61;

// Optional time of day; it is dropped.
const TIME_SUFFIX = String.raw`(?:[T ]\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?`;

const YEAR_FIRST_RE = new RegExp(String.raw`^(\d{4})[-/](\d{1,2})[-/](\d{1,2})${TIME_SUFFIX}$`);
const DAY_FIRST_RE = new RegExp(String.raw`^(\d{1,2})[/.-](\d{1,2})[/.-](\d{4})${TIME_SUFFIX}$`);

/**
 * Null, undefined, NaN and blank strings all mean "no value". Spreadsheet
 * readers emit any of them for an empty cell.
 */
export function isBlank(v: unknown): boolean {
  if (v === undefined || v === null) return true;
  if (typeof v === "number") return Number.isNaN(v);
  if (typeof v === "string") return v.trim() === "";
  return false;
}

export function excelSerialToIsoDate(serial: number): IsoDate | null {
  if (!Number.isFinite(serial) || serial < MIN_EXCEL_SERIAL) return null;
  return fromEpochDay(Math.floor(serial) - EXCEL_EPOCH_OFFSET);
}

export function parseDateString(s: string): IsoDate | null {
  const v = s.trim();

  const ymd = YEAR_FIRST_RE.exec(v);
  if (ymd) return ymdOrNull(Number(ymd[1]), Number(ymd[2]), Number(ymd[3]));

  const dmy = DAY_FIRST_RE.exec(v);
  if (dmy) return ymdOrNull(Number(dmy[3]), Number(dmy[2]), Number(dmy[1]));

  return null;
}

function ymdOrNull(year: number, month: number, day: number): IsoDate | null {
  return isValidYmd(year, month, day) ? formatYmd(year, month, day) : null;
}

/* ------------------------------------------------------------------ */
/*                            Field parsers                           */
/* ------------------------------------------------------------------ */

export const CalendarDateField = z
  .union([z.date(), z.number(), z.string()])
  .transform((v, ctx) => {
    const iso =
      v instanceof Date
        ? fromJsDate(v)
        : typeof v === "number"
        ? excelSerialToIsoDate(v)
        : parseDateString(v);

    if (iso === null) {
      ctx.addIssue({ code: "custom", message: "Not a calendar date" });
      return z.NEVER;
    }
    return iso;
  });

export function personIdField(width: number) {
  return z
    .union([
      z.string().trim().min(1),
      z.number().int().nonnegative(),
    ])
    .transform((v) => String(v).padStart(width, "0"));
}

export const CategoryField = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim());

export const RawRecordSchema = z.record(z.string(), z.unknown());

export function describeValue(v: unknown): string {
  if (typeof v === "string") return JSON.stringify(v);
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? "Invalid Date" : v.toISOString();
  if (typeof v === "object" && v !== null) return Object.prototype.toString.call(v);
  return String(v);
}
