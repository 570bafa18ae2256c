export * from "./category-assignment.js";
export * from "./timeline-layout.js";
