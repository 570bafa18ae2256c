import { normalizeSelection } from "../../records/src/categories.js";

// Size of the qualitative palette the chart layer cycles through.
export const PALETTE_SIZE = 12;

export type CategoryAssignment = {
  category: string;
  order: number; // position in the de-duplicated selection
  color_index: number; // order % palette size
};

/**
 * One explicit category -> (order, colour slot) table per invocation.
 * Both views read it, so a category keeps its colour even when another
 * selected category has no data.
 */
export function assignCategories(
  categories: readonly string[],
  palette_size: number = PALETTE_SIZE
): CategoryAssignment[] {
  if (!Number.isInteger(palette_size) || palette_size < 1) {
    throw new Error(`INVALID_PALETTE_SIZE: ${palette_size}`);
  }
  return normalizeSelection(categories).map((category, order) => ({
    category,
    order,
    color_index: order % palette_size,
  }));
}
