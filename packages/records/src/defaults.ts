import type { RecordFieldNames, RejectionReason } from "./schema.js";

export const PERSON_ID_WIDTH = 9;
export const MAX_DURATION_DAYS = 10_000;

export const DEFAULT_FIELD_NAMES: RecordFieldNames = {
  person_id: "DNI",
  category: "CATEGORIA",
  start: "Falta",
  end: "Fbaja",
};

export const REJECTION_REASONS: readonly RejectionReason[] = [
  "NOT_A_RECORD",
  "MISSING_FIELD",
  "UNPARSEABLE_FIELD",
  "NEGATIVE_DURATION",
  "DURATION_TOO_LONG",
];

export function emptyRejectionCounts(): Record<RejectionReason, number> {
  return {
    NOT_A_RECORD: 0,
    MISSING_FIELD: 0,
    UNPARSEABLE_FIELD: 0,
    NEGATIVE_DURATION: 0,
    DURATION_TOO_LONG: 0,
  };
}
