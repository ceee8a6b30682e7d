/**
 * Analysis Module
 *
 * Dependency closures, cycle handling and component classification over
 * the extracted graph.
 *
 * @module
 */

export * from "./dependency-graph.js";
export * from "./dependency-resolver.js";
export * from "./classification-rules.js";
export * from "./classifier.js";
export * from "./file-summary.js";
