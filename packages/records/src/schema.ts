// Contract record model.
// Types only. No functions.

import type { IsoDate } from "../../calendar/src/dates.js";

/* ------------------------------ Raw input ---------------------------- */

/**
 * One row as handed over by the ingestion layer. Column values have no
 * guaranteed type: spreadsheets yield strings, Date objects and numeric
 * serials interchangeably.
 */
export type RawContractRecord = Record<string, unknown>;

export type IntervalField = "person_id" | "category" | "start" | "end";

/** Column names of the source table for each interval field. */
export type RecordFieldNames = Record<IntervalField, string>;

/* ------------------------------ Interval ----------------------------- */

export type Interval = Readonly<{
  record_index: number; // position in the raw input
  person_id: string; // zero-padded, fixed width
  category: string; // trimmed
  start: IsoDate; // inclusive
  end: IsoDate; // inclusive
  duration_days: number; // end - start
}>;

/* ----------------------------- Rejections ---------------------------- */

export type RejectionReason =
  | "NOT_A_RECORD"
  | "MISSING_FIELD"
  | "UNPARSEABLE_FIELD"
  | "NEGATIVE_DURATION"
  | "DURATION_TOO_LONG";

export type RecordRejection = {
  record_index: number;
  reason: RejectionReason;
  field: IntervalField | "duration_days" | null;
  message: string;
};

export type SanitizeRecordResult =
  | { ok: true; interval: Interval }
  | { ok: false; rejection: RecordRejection };

export type SanitizeResult = {
  intervals: Interval[];
  rejected: RecordRejection[];
  rejected_count: number;
  rejected_by_reason: Record<RejectionReason, number>;
  notes: string[];
};

export type SanitizeOptions = {
  fields?: Partial<RecordFieldNames>;
  person_id_width?: number;
  max_duration_days?: number;
};
