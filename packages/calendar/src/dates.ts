/**
 * Calendar-date primitives.
 *
 * Dates are plain ISO strings (`YYYY-MM-DD`) with no time of day. Four-digit
 * years keep lexicographic order equal to chronological order, so callers can
 * compare with `<` / `>=` directly.
 */

export type IsoDate = string;

export const MS_PER_DAY = 86_400_000;

export const MIN_YEAR = 1000;
export const MAX_YEAR = 9999;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export type YearMonthDay = { year: number; month: number; day: number };

export function isValidYmd(year: number, month: number, day: number): boolean {
  if (![year, month, day].every(Number.isInteger)) return false;
  if (year < MIN_YEAR || year > MAX_YEAR) return false;
  if (month < 1 || month > 12 || day < 1) return false;

  const dt = new Date(Date.UTC(year, month - 1, day));
  return (
    dt.getUTCFullYear() === year &&
    dt.getUTCMonth() === month - 1 &&
    dt.getUTCDate() === day
  );
}

export function formatYmd(year: number, month: number, day: number): IsoDate {
  const y = String(year).padStart(4, "0");
  const m = String(month).padStart(2, "0");
  const d = String(day).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function isIsoDate(v: unknown): v is IsoDate {
  if (typeof v !== "string") return false;
  const m = ISO_DATE_RE.exec(v);
  if (!m) return false;
  return isValidYmd(Number(m[1]), Number(m[2]), Number(m[3]));
}

export function parseIsoDate(iso: IsoDate): YearMonthDay {
  const m = ISO_DATE_RE.exec(iso);
  if (!m) throw new Error(`INVALID_ISO_DATE: '${iso}'`);
  return { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) };
}

/** Days since 1970-01-01 (UTC). */
export function toEpochDay(iso: IsoDate): number {
  const { year, month, day } = parseIsoDate(iso);
  return Date.UTC(year, month - 1, day) / MS_PER_DAY;
}

export function fromEpochDay(epochDay: number): IsoDate | null {
  if (!Number.isInteger(epochDay)) return null;
  const dt = new Date(epochDay * MS_PER_DAY);
  if (Number.isNaN(dt.getTime())) return null;

  const year = dt.getUTCFullYear();
  const month = dt.getUTCMonth() + 1;
  const day = dt.getUTCDate();
  return isValidYmd(year, month, day) ? formatYmd(year, month, day) : null;
}

/**
 * Local calendar day of a JS Date, or null for an invalid Date. Spreadsheet
 * readers build dates at local midnight, so the UTC day can be the previous one.
 */
export function fromJsDate(d: Date): IsoDate | null {
  if (Number.isNaN(d.getTime())) return null;
  const year = d.getFullYear();
  const month = d.getMonth() + 1;
  const day = d.getDate();
  return isValidYmd(year, month, day) ? formatYmd(year, month, day) : null;
}

export function daysBetween(start: IsoDate, end: IsoDate): number {
  return toEpochDay(end) - toEpochDay(start);
}

export function floorToMonth(iso: IsoDate): IsoDate {
  return `${iso.slice(0, 7)}-01`;
}

export function addMonths(iso: IsoDate, n: number): IsoDate {
  const { year, month } = parseIsoDate(iso);
  const total = year * 12 + (month - 1) + n;
  return formatYmd(Math.floor(total / 12), (total % 12) + 1, 1);
}

export function yearOf(iso: IsoDate): number {
  return parseIsoDate(iso).year;
}

export function minDate(dates: Iterable<IsoDate>): IsoDate | null {
  let out: IsoDate | null = null;
  for (const d of dates) if (out === null || d < out) out = d;
  return out;
}

export function maxDate(dates: Iterable<IsoDate>): IsoDate | null {
  let out: IsoDate | null = null;
  for (const d of dates) if (out === null || d > out) out = d;
  return out;
}
