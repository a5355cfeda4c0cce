/**
 * Student records: an in-memory record store with indexed lookup,
 * on-demand ordering and top-k selection.
 */

export * from "./records/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
