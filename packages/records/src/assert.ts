import { z } from "zod";
import { daysBetween, isIsoDate } from "../../calendar/src/dates.js";
import type { Interval } from "./schema.js";

const SanitizedIntervalSchema = z.object({
  record_index: z.number().int().nonnegative(),
  person_id: z.string().min(1),
  category: z.string().min(1),
  start: z.string().refine(isIsoDate, "start is not an ISO date"),
  end: z.string().refine(isIsoDate, "end is not an ISO date"),
  duration_days: z.number().int().nonnegative(),
});

/**
 * Downstream components only accept sanitizer output. Anything else reaching
 * them is a wiring bug, so this throws instead of producing a rejection.
 */
export function assertSanitizedInterval(value: unknown): asserts value is Interval {
  const r = SanitizedIntervalSchema.safeParse(value);
  if (!r.success) {
    const first = r.error.issues[0];
    const where = first ? first.path.map(String).join(".") : "";
    throw new Error(`UNSANITIZED_INTERVAL: ${where ? `${where}: ` : ""}${first?.message ?? "invalid"}`);
  }

  const i = r.data;
  if (i.category !== i.category.trim()) {
    throw new Error(`UNSANITIZED_INTERVAL: category '${i.category}' is not trimmed`);
  }
  if (daysBetween(i.start, i.end) !== i.duration_days) {
    throw new Error(
      `UNSANITIZED_INTERVAL: duration_days ${i.duration_days} does not match ${i.start}..${i.end}`
    );
  }
}

export function assertSanitizedIntervals(values: readonly unknown[]): asserts values is readonly Interval[] {
  for (const v of values) assertSanitizedInterval(v);
}
