/**
 * Extraction Module
 *
 * @module
 */

export * from "./extraction-engine.js";
export * from "./entity-builder.js";
export * from "./import-resolver.js";
export * from "./provenance.js";
export * from "./reference-resolver.js";
