/**
 * Core module - everything the CLI and library callers build on
 */

export * from "./errors.js";
export * from "./config.js";

export * from "./graph/index.js";
export * from "./parser/index.js";
export * from "./inference/index.js";
export * from "./indexer/index.js";
export * from "./extraction/index.js";
export * from "./analysis/index.js";
export * from "./planning/index.js";
export * from "./audit/index.js";
export * from "./pipeline/index.js";
export * from "./export/index.js";

export * from "../types/index.js";
