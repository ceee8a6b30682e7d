/**
 * Graph Store Module
 *
 * Property-graph persistence for project metadata: an in-process store on
 * graphology and a Neo4j adapter, both behind IGraphStore.
 *
 * @module
 */

import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { GraphStoreConfig } from "../../utils/validation.js";
import { MemoryGraphStore } from "./memory-graph-store.js";
import { Neo4jGraphStore, createNeo4jDriver } from "./neo4j-graph-store.js";

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
} from "../interfaces/IGraphStore.js";

export { MemoryGraphStore } from "./memory-graph-store.js";
export { Neo4jGraphStore, createNeo4jDriver, mapNeo4jError } from "./neo4j-graph-store.js";
export * from "./schema.js";
export * from "./property-codec.js";
export * from "./cypher-builder.js";
export * from "./constraints.js";
export * from "./graph-access.js";

/**
 * Creates (but does not initialize) the store selected by configuration.
 */
export function createGraphStore(config: GraphStoreConfig): IGraphStore {
  if (config.backend === "neo4j") {
    const driver = createNeo4jDriver(config.neo4j);
    return new Neo4jGraphStore(driver, { database: config.neo4j.database });
  }
  return new MemoryGraphStore();
}
