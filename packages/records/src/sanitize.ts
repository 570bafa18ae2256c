import type { z } from "zod";
import { daysBetween } from "../../calendar/src/dates.js";
import {
  DEFAULT_FIELD_NAMES,
  MAX_DURATION_DAYS,
  emptyRejectionCounts,
  PERSON_ID_WIDTH,
  REJECTION_REASONS,
} from "./defaults.js";
import {
  CalendarDateField,
  CategoryField,
  RawRecordSchema,
  describeValue,
  isBlank,
  personIdField,
} from "./fields.js";
import type {
  Interval,
  IntervalField,
  RawContractRecord,
  RecordFieldNames,
  RecordRejection,
  RejectionReason,
  SanitizeOptions,
  SanitizeRecordResult,
  SanitizeResult,
} from "./schema.js";

type ResolvedOptions = {
  fields: RecordFieldNames;
  person_id_width: number;
  max_duration_days: number;
};

function resolveOptions(opts: SanitizeOptions): ResolvedOptions {
  return {
    fields: { ...DEFAULT_FIELD_NAMES, ...(opts.fields ?? {}) },
    person_id_width: opts.person_id_width ?? PERSON_ID_WIDTH,
    max_duration_days: opts.max_duration_days ?? MAX_DURATION_DAYS,
  };
}

/**
 * Validates the whole batch. Bad rows are collected as rejections and never
 * abort the run; surviving intervals keep input order.
 */
export function sanitizeRecords(raw: readonly unknown[], opts: SanitizeOptions = {}): SanitizeResult {
  const intervals: Interval[] = [];
  const rejected: RecordRejection[] = [];

  raw.forEach((rec, idx) => {
    const r = sanitizeRecord(rec, idx, opts);
    if (r.ok) intervals.push(r.interval);
    else rejected.push(r.rejection);
  });

  const rejected_by_reason = emptyRejectionCounts();
  for (const r of rejected) rejected_by_reason[r.reason] += 1;

  const notes: string[] = [`${intervals.length} of ${raw.length} records accepted.`];
  for (const reason of REJECTION_REASONS) {
    const n = rejected_by_reason[reason];
    if (n > 0) notes.push(`${n} record(s) rejected: ${reason}`);
  }

  return {
    intervals,
    rejected,
    rejected_count: rejected.length,
    rejected_by_reason,
    notes,
  };
}

/**
 * Raw heterogeneous record -> Interval or rejection. Fields are checked in the
 * order person_id, category, start, end, then duration; the first failure wins.
 */
export function sanitizeRecord(
  raw: unknown,
  record_index: number,
  opts: SanitizeOptions = {}
): SanitizeRecordResult {
  const o = resolveOptions(opts);

  const shape = RawRecordSchema.safeParse(raw);
  if (!shape.success) {
    return reject(record_index, "NOT_A_RECORD", null, `Record ${record_index} is not an object`);
  }
  const rec: RawContractRecord = shape.data;

  const person_id = readField(rec, o.fields, "person_id", personIdField(o.person_id_width), record_index);
  if (!person_id.ok) return person_id;

  const category = readField(rec, o.fields, "category", CategoryField, record_index);
  if (!category.ok) return category;
  if (category.value === "") {
    return reject(record_index, "MISSING_FIELD", "category", `${o.fields.category} is missing`);
  }

  const start = readField(rec, o.fields, "start", CalendarDateField, record_index);
  if (!start.ok) return start;

  const end = readField(rec, o.fields, "end", CalendarDateField, record_index);
  if (!end.ok) return end;

  const duration_days = daysBetween(start.value, end.value);

  if (duration_days < 0) {
    return reject(
      record_index,
      "NEGATIVE_DURATION",
      "duration_days",
      `End ${end.value} is before start ${start.value} (${duration_days} days)`
    );
  }

  if (duration_days > o.max_duration_days) {
    return reject(
      record_index,
      "DURATION_TOO_LONG",
      "duration_days",
      `Duration ${duration_days} days exceeds ${o.max_duration_days}`
    );
  }

  const interval: Interval = Object.freeze({
    record_index,
    person_id: person_id.value,
    category: category.value,
    start: start.value,
    end: end.value,
    duration_days,
  });

  return { ok: true, interval };
}

/* ------------------------------ internals ------------------------------ */

type FieldRead<T> = { ok: true; value: T } | { ok: false; rejection: RecordRejection };

function readField<S extends z.ZodType>(
  rec: RawContractRecord,
  names: RecordFieldNames,
  field: IntervalField,
  schema: S,
  record_index: number
): FieldRead<z.output<S>> {
  const column = names[field];
  const v = rec[column];

  if (isBlank(v)) {
    return reject(record_index, "MISSING_FIELD", field, `${column} is missing`);
  }

  const parsed = schema.safeParse(v);
  if (!parsed.success) {
    return reject(
      record_index,
      "UNPARSEABLE_FIELD",
      field,
      `${column}: cannot parse ${describeValue(v)}`
    );
  }

  return { ok: true, value: parsed.data };
}

function reject(
  record_index: number,
  reason: RejectionReason,
  field: RecordRejection["field"],
  message: string
): { ok: false; rejection: RecordRejection } {
  return { ok: false, rejection: { record_index, reason, field, message } };
}
