export * from "./schema.js";
export * from "./defaults.js";
export * from "./fields.js";
export * from "./sanitize.js";
export * from "./categories.js";
export * from "./assert.js";
export * from "./fingerprint.js";
