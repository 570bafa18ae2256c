import { yearOf, type IsoDate } from "./dates.js";

/**
 * Years Y whose January 1st lies in `(min, max]`.
 *
 * Jan 1 of min's own year is never strictly after min, and Jan 1 of max's
 * year is never after max, so the answer is the closed year range
 * `[year(min) + 1, year(max)]`.
 */
export function yearBoundaries(
  min: IsoDate | null | undefined,
  max: IsoDate | null | undefined
): number[] {
  if (!min || !max || min > max) return [];

  const years: number[] = [];
  for (let y = yearOf(min) + 1; y <= yearOf(max); y++) years.push(y);
  return years;
}
