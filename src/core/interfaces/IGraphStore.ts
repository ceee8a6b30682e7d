/**
 * IGraphStore - Abstract property-graph store
 *
 * Provides project-scoped graph storage with support for:
 * - Idempotent node and edge upserts keyed by natural key
 * - Atomic multi-write transactions
 * - Node, edge and variable-length traversal queries
 *
 * Every node belongs to exactly one project and an edge never crosses
 * projects; stores reject such writes with ConstraintViolationError.
 *
 * @module
 */

import type { NodeLabel, RelationshipType } from "../graph/schema.js";
import type { PropertyBag } from "../../types/entities.js";

// =============================================================================
// Records
// =============================================================================

/**
 * Identity of a node: its project, label and natural key.
 */
export interface NodeRef {
  projectId: string;
  label: NodeLabel;
  key: string;
}

export interface NodeRecord extends NodeRef {
  properties: PropertyBag;
}

export interface EdgeRecord {
  type: RelationshipType;
  from: NodeRef;
  to: NodeRef;
  properties: PropertyBag;
}

export interface TraversalRow {
  node: NodeRecord;
  /** Length of the shortest path from the start node */
  hops: number;
}

/**
 * Query result from the graph store.
 */
export interface QueryResult<T> {
  rows: T[];
  stats: {
    rowsAffected: number;
    executionTimeMs: number;
  };
}

// =============================================================================
// Query Patterns
// =============================================================================

export type ScalarValue = string | number | boolean | null;

/**
 * Nodes of one project, optionally narrowed by label and property equality.
 */
export interface NodePattern {
  kind: "nodes";
  projectId: string;
  label?: NodeLabel;
  where?: Record<string, ScalarValue>;
}

/**
 * Edges of one project, optionally narrowed by type and endpoints.
 */
export interface EdgePattern {
  kind: "edges";
  projectId: string;
  types?: RelationshipType[];
  from?: NodeRef;
  to?: NodeRef;
  fromLabel?: NodeLabel;
  toLabel?: NodeLabel;
}

/**
 * Nodes reachable from `start` over the given edge types. `maxHops`
 * bounds the path length; without it the traversal is unbounded and still
 * terminates on cycles. The start node itself is not returned.
 */
export interface TraversalPattern {
  kind: "traverse";
  start: NodeRef;
  types: RelationshipType[];
  direction?: "out" | "in";
  maxHops?: number;
}

export type GraphPattern = NodePattern | EdgePattern | TraversalPattern;

// =============================================================================
// Store Interfaces
// =============================================================================

export interface IGraphReader {
  query(pattern: NodePattern): Promise<QueryResult<NodeRecord>>;
  query(pattern: EdgePattern): Promise<QueryResult<EdgeRecord>>;
  query(pattern: TraversalPattern): Promise<QueryResult<TraversalRow>>;
}

export interface IGraphWriter {
  /**
   * Create the node or merge `properties` into it (last write wins per
   * property). `project_id` is always set from the ref.
   */
  upsertNode(ref: NodeRef, properties: PropertyBag): Promise<void>;

  /**
   * Create the edge or merge its properties. Natural key is (type, from, to).
   * For functional relationship types any other outgoing edge of the same
   * type from `from` is removed.
   *
   * @throws ConstraintViolationError if an endpoint is missing, the
   * endpoints belong to different projects, or the labels don't fit the type
   */
  upsertEdge(type: RelationshipType, from: NodeRef, to: NodeRef, properties?: PropertyBag): Promise<void>;

  /**
   * Delete the edge with natural key (type, from, to). Nothing happens when
   * it does not exist.
   */
  removeEdge(type: RelationshipType, from: NodeRef, to: NodeRef): Promise<void>;
}

/**
 * Transaction handle. Writes are applied together when the transaction
 * function resolves and discarded when it throws.
 */
export interface ITransaction extends IGraphReader, IGraphWriter {}

/**
 * Graph store interface.
 *
 * @example
 * ```typescript
 * const store = new MemoryGraphStore();
 * await store.initialize();
 *
 * const file: NodeRef = { projectId: "p1", label: "File", key: "main.py" };
 * await store.transaction(async (tx) => {
 *   await tx.upsertNode(file, { path: "main.py", language: "python" });
 *   await tx.upsertEdge("CONTAINS", projectRef, file);
 * });
 *
 * const { rows } = await store.query({ kind: "nodes", projectId: "p1", label: "File" });
 * ```
 */
export interface IGraphStore extends IGraphReader, IGraphWriter {
  /**
   * Connect and create constraints. Idempotent.
   *
   * @throws TransientStoreError if the backend is unreachable
   */
  initialize(): Promise<void>;

  /**
   * Run `fn` as one atomic unit: every write lands or none does.
   */
  transaction<T>(fn: (tx: ITransaction) => Promise<T>): Promise<T>;

  /**
   * Ids of every project with a Project node, sorted.
   */
  listProjectIds(): Promise<string[]>;

  /**
   * Delete every node and edge of a project. Administrative cleanup only.
   *
   * @returns number of nodes removed
   */
  purgeProject(projectId: string): Promise<number>;

  close(): Promise<void>;

  readonly isReady: boolean;
}
