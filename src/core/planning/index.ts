/**
 * Planning module: mappings and migration strategies
 */

export * from "./type-expression.js";
export * from "./mapping-rules.js";
export * from "./mapping-generator.js";
export * from "./strategy-scheduler.js";
