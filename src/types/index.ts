/**
 * Shared pipeline and validation types.
 */

export * from "./pipeline.js";
export * from "./issues.js";
