/**
 * Core Interfaces Module
 *
 * Contracts between the pipeline and its replaceable capabilities: the
 * graph store, the syntax parser and the inference service.
 *
 * @module
 */

export type {
  IGraphStore,
  IGraphReader,
  IGraphWriter,
  ITransaction,
  NodeRef,
  NodeRecord,
  EdgeRecord,
  TraversalRow,
  QueryResult,
  GraphPattern,
  NodePattern,
  EdgePattern,
  TraversalPattern,
  ScalarValue,
} from "./IGraphStore.js";

export type { ISyntaxParser } from "./ISyntaxParser.js";

export * from "./IInferenceService.js";
