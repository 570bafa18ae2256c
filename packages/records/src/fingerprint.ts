import { createHash } from "node:crypto";
import type { Interval } from "./schema.js";

/* ---------------------------- Contract keys ---------------------------- */

// Identity of a contract once sanitized. record_index and duration_days are
// left out: the first depends on row order, the second follows from the dates.
function contractKey(i: Interval): string {
  return JSON.stringify([i.person_id, i.category, i.start, i.end]);
}

/**
 * SHA-256 over the sorted contract keys. Reordered rows or a different cell
 * layout for the same dates give the same fingerprint; an added, dropped or
 * changed contract does not. Duplicates count.
 */
export function fingerprintIntervals(intervals: readonly Interval[]): string {
  const h = createHash("sha256");
  for (const key of intervals.map(contractKey).sort()) h.update(key + "\n");
  return h.digest("hex");
}

/* ------------------------------- Diffing ------------------------------- */

export type IntervalSetDiff = {
  same: boolean;
  left_fingerprint: string;
  right_fingerprint: string;
  only_left: Interval[];
  only_right: Interval[];
};

/** Multiset difference of two sanitized batches, each side in input order. */
export function diffIntervalSets(
  left: readonly Interval[],
  right: readonly Interval[]
): IntervalSetDiff {
  const unmatched = new Map<string, number>();
  for (const i of right) {
    const k = contractKey(i);
    unmatched.set(k, (unmatched.get(k) ?? 0) + 1);
  }

  const only_left: Interval[] = [];
  for (const i of left) {
    const k = contractKey(i);
    const n = unmatched.get(k) ?? 0;
    if (n > 0) unmatched.set(k, n - 1);
    else only_left.push(i);
  }

  const only_right: Interval[] = [];
  for (const i of right) {
    const k = contractKey(i);
    const n = unmatched.get(k) ?? 0;
    if (n === 0) continue;
    unmatched.set(k, n - 1);
    only_right.push(i);
  }

  return {
    same: only_left.length === 0 && only_right.length === 0,
    left_fingerprint: fingerprintIntervals(left),
    right_fingerprint: fingerprintIntervals(right),
    only_left,
    only_right,
  };
}
