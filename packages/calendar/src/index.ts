export * from "./dates.js";
export * from "./month-grid.js";
export * from "./year-boundaries.js";
