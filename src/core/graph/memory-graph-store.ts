/**
 * In-process graph store on graphology
 *
 * Holds every project's subgraph in one MultiDirectedGraph. Transactions
 * stage their writes and apply them in a single synchronous step once the
 * transaction function resolves, so concurrent readers never observe half
 * of a file's entities.
 *
 * @module
 */

import { MultiDirectedGraph } from "graphology";
import { TransientStoreError, ErrorCode } from "../errors.js";
import type {
  EdgePattern,
  EdgeRecord,
  GraphPattern,
  IGraphStore,
  ITransaction,
  NodePattern,
  NodeRecord,
  NodeRef,
  QueryResult,
  TraversalPattern,
  TraversalRow,
} from "../interfaces/IGraphStore.js";
import type { PropertyBag } from "../../types/entities.js";
import { isFunctionalRelationship, type RelationshipType } from "./schema.js";
import {
  assertValidEdge,
  assertValidNodeRef,
  edgeUid,
  missingEndpointError,
  nodeUid,
  sameNode,
} from "./constraints.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("memory-graph-store");

// =============================================================================
// Types
// =============================================================================

type NodeAttributes = {
  ref: NodeRef;
  properties: PropertyBag;
};

type EdgeAttributes = {
  type: RelationshipType;
  properties: PropertyBag;
};

type StagedWrite =
  | { op: "node"; ref: NodeRef; properties: PropertyBag }
  | { op: "edge"; type: RelationshipType; from: NodeRef; to: NodeRef; properties: PropertyBag }
  | { op: "unlink"; type: RelationshipType; from: NodeRef; to: NodeRef };

type AnyQueryResult = QueryResult<NodeRecord> | QueryResult<EdgeRecord> | QueryResult<TraversalRow>;

function result<T>(rows: T[], startedAt: number): QueryResult<T> {
  return { rows, stats: { rowsAffected: rows.length, executionTimeMs: Date.now() - startedAt } };
}

function matchesWhere(properties: PropertyBag, where: NodePattern["where"]): boolean {
  if (!where) return true;
  return Object.entries(where).every(([name, value]) => (properties[name] ?? null) === value);
}

// =============================================================================
// Transaction
// =============================================================================

class MemoryTransaction implements ITransaction {
  readonly writes: StagedWrite[] = [];

  constructor(private readonly store: MemoryGraphStore) {}

  query(pattern: NodePattern): Promise<QueryResult<NodeRecord>>;
  query(pattern: EdgePattern): Promise<QueryResult<EdgeRecord>>;
  query(pattern: TraversalPattern): Promise<QueryResult<TraversalRow>>;
  async query(pattern: GraphPattern): Promise<AnyQueryResult> {
    return this.store.read(pattern);
  }

  async upsertNode(ref: NodeRef, properties: PropertyBag): Promise<void> {
    this.writes.push({ op: "node", ref, properties: structuredClone(properties) });
  }

  async upsertEdge(type: RelationshipType, from: NodeRef, to: NodeRef, properties: PropertyBag = {}): Promise<void> {
    this.writes.push({ op: "edge", type, from, to, properties: structuredClone(properties) });
  }

  async removeEdge(type: RelationshipType, from: NodeRef, to: NodeRef): Promise<void> {
    this.writes.push({ op: "unlink", type, from, to });
  }
}

// =============================================================================
// Store
// =============================================================================

/**
 * Graph store backed by an in-memory graphology multigraph.
 *
 * @example
 * ```typescript
 * const store = new MemoryGraphStore();
 * await store.initialize();
 * await store.upsertNode({ projectId: "p1", label: "Project", key: "p1" }, { name: "demo" });
 * ```
 */
export class MemoryGraphStore implements IGraphStore {
  private readonly graph = new MultiDirectedGraph<NodeAttributes, EdgeAttributes>();
  private ready = false;

  get isReady(): boolean {
    return this.ready;
  }

  async initialize(): Promise<void> {
    this.ready = true;
  }

  async close(): Promise<void> {
    this.ready = false;
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  async upsertNode(ref: NodeRef, properties: PropertyBag): Promise<void> {
    await this.transaction((tx) => tx.upsertNode(ref, properties));
  }

  async upsertEdge(type: RelationshipType, from: NodeRef, to: NodeRef, properties: PropertyBag = {}): Promise<void> {
    await this.transaction((tx) => tx.upsertEdge(type, from, to, properties));
  }

  async removeEdge(type: RelationshipType, from: NodeRef, to: NodeRef): Promise<void> {
    await this.transaction((tx) => tx.removeEdge(type, from, to));
  }

  async transaction<T>(fn: (tx: ITransaction) => Promise<T>): Promise<T> {
    this.assertReady();
    const tx = new MemoryTransaction(this);
    const value = await fn(tx);
    this.commit(tx.writes);
    return value;
  }

  async listProjectIds(): Promise<string[]> {
    this.assertReady();
    return this.graph
      .filterNodes((_, attributes) => attributes.ref.label === "Project")
      .map((node) => this.graph.getNodeAttributes(node).ref.key)
      .sort();
  }

  async purgeProject(projectId: string): Promise<number> {
    this.assertReady();
    const doomed = this.graph.filterNodes((_, attributes) => attributes.ref.projectId === projectId);
    for (const node of doomed) {
      this.graph.dropNode(node);
    }
    logger.info({ projectId, nodes: doomed.length }, "Project purged");
    return doomed.length;
  }

  /**
   * Validates every staged write against the committed graph plus the nodes
   * staged before it, then applies them. A violation leaves the graph
   * untouched.
   */
  private commit(writes: StagedWrite[]): void {
    const staged = new Set<string>();
    const exists = (ref: NodeRef): boolean => staged.has(nodeUid(ref)) || this.graph.hasNode(nodeUid(ref));

    for (const write of writes) {
      if (write.op === "node") {
        assertValidNodeRef(write.ref);
        staged.add(nodeUid(write.ref));
        continue;
      }
      if (write.op === "unlink") continue;
      assertValidEdge(write.type, write.from, write.to);
      if (!exists(write.from)) throw missingEndpointError(write.type, write.from);
      if (!exists(write.to)) throw missingEndpointError(write.type, write.to);
    }

    for (const write of writes) {
      switch (write.op) {
        case "node":
          this.applyNode(write.ref, write.properties);
          break;
        case "edge":
          this.applyEdge(write.type, write.from, write.to, write.properties);
          break;
        case "unlink":
          this.dropEdge(edgeUid(write.type, write.from, write.to));
          break;
      }
    }
  }

  private applyNode(ref: NodeRef, properties: PropertyBag): void {
    const id = nodeUid(ref);
    const merged: PropertyBag = { ...properties, project_id: ref.projectId };
    if (this.graph.hasNode(id)) {
      const current = this.graph.getNodeAttributes(id);
      this.graph.replaceNodeAttributes(id, { ref, properties: { ...current.properties, ...merged } });
    } else {
      this.graph.addNode(id, { ref: { ...ref }, properties: merged });
    }
  }

  private dropEdge(key: string): void {
    if (this.graph.hasEdge(key)) {
      this.graph.dropEdge(key);
    }
  }

  private applyEdge(type: RelationshipType, from: NodeRef, to: NodeRef, properties: PropertyBag): void {
    const source = nodeUid(from);
    const target = nodeUid(to);

    if (isFunctionalRelationship(type)) {
      const replaced = this.graph.filterOutEdges(
        source,
        (_, attributes, _source, edgeTarget) => attributes.type === type && edgeTarget !== target
      );
      for (const edge of replaced) {
        this.graph.dropEdge(edge);
      }
    }

    const key = edgeUid(type, from, to);
    if (this.graph.hasEdge(key)) {
      const current = this.graph.getEdgeAttributes(key);
      this.graph.replaceEdgeAttributes(key, { type, properties: { ...current.properties, ...properties } });
    } else {
      this.graph.addEdgeWithKey(key, source, target, { type, properties });
    }
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  query(pattern: NodePattern): Promise<QueryResult<NodeRecord>>;
  query(pattern: EdgePattern): Promise<QueryResult<EdgeRecord>>;
  query(pattern: TraversalPattern): Promise<QueryResult<TraversalRow>>;
  async query(pattern: GraphPattern): Promise<AnyQueryResult> {
    return this.read(pattern);
  }

  /** @internal shared by the store and its transactions */
  read(pattern: GraphPattern): AnyQueryResult {
    this.assertReady();
    switch (pattern.kind) {
      case "nodes":
        return this.findNodes(pattern);
      case "edges":
        return this.findEdges(pattern);
      case "traverse":
        return this.traverse(pattern);
    }
  }

  private findNodes(pattern: NodePattern): QueryResult<NodeRecord> {
    const startedAt = Date.now();
    const rows: NodeRecord[] = [];
    this.graph.forEachNode((_, attributes) => {
      const { ref, properties } = attributes;
      if (ref.projectId !== pattern.projectId) return;
      if (pattern.label && ref.label !== pattern.label) return;
      if (!matchesWhere(properties, pattern.where)) return;
      rows.push(this.toNodeRecord(attributes));
    });
    return result(rows, startedAt);
  }

  private findEdges(pattern: EdgePattern): QueryResult<EdgeRecord> {
    const startedAt = Date.now();
    const rows: EdgeRecord[] = [];
    this.graph.forEachEdge((_, attributes, _source, _target, sourceAttributes, targetAttributes) => {
      const from = sourceAttributes.ref;
      const to = targetAttributes.ref;
      if (from.projectId !== pattern.projectId) return;
      if (pattern.types && !pattern.types.includes(attributes.type)) return;
      if (pattern.from && !sameNode(pattern.from, from)) return;
      if (pattern.to && !sameNode(pattern.to, to)) return;
      if (pattern.fromLabel && from.label !== pattern.fromLabel) return;
      if (pattern.toLabel && to.label !== pattern.toLabel) return;
      rows.push({
        type: attributes.type,
        from: { ...from },
        to: { ...to },
        properties: structuredClone(attributes.properties),
      });
    });
    return result(rows, startedAt);
  }

  /**
   * Breadth-first traversal; the visited set keeps it finite on cycles and
   * makes `hops` the shortest distance.
   */
  private traverse(pattern: TraversalPattern): QueryResult<TraversalRow> {
    const startedAt = Date.now();
    const start = nodeUid(pattern.start);
    if (!this.graph.hasNode(start)) {
      return result([], startedAt);
    }

    const types = new Set(pattern.types);
    const limit = pattern.maxHops ?? Number.POSITIVE_INFINITY;
    const visited = new Set<string>([start]);
    const rows: TraversalRow[] = [];
    let frontier = [start];

    for (let hops = 1; hops <= limit && frontier.length > 0; hops++) {
      const next: string[] = [];
      for (const node of frontier) {
        const visit = (edgeAttributes: EdgeAttributes, neighbour: string): void => {
          if (!types.has(edgeAttributes.type) || visited.has(neighbour)) return;
          visited.add(neighbour);
          next.push(neighbour);
          rows.push({ node: this.toNodeRecord(this.graph.getNodeAttributes(neighbour)), hops });
        };
        if (pattern.direction === "in") {
          this.graph.forEachInEdge(node, (_, attributes, source) => visit(attributes, source));
        } else {
          this.graph.forEachOutEdge(node, (_, attributes, _source, target) => visit(attributes, target));
        }
      }
      frontier = next;
    }

    return result(rows, startedAt);
  }

  private toNodeRecord(attributes: NodeAttributes): NodeRecord {
    return { ...attributes.ref, properties: structuredClone(attributes.properties) };
  }

  private assertReady(): void {
    if (!this.ready) {
      throw new TransientStoreError("Graph store is not initialized", ErrorCode.STORE_NOT_INITIALIZED);
    }
  }
}
