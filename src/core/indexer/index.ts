/**
 * Indexer Module
 *
 * @module
 */

export * from "./scanner.js";
