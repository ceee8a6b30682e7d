/**
 * Neo4j Graph Store Adapter
 *
 * Implements IGraphStore over neo4j-driver. The driver (and its connection
 * pool) is created by the caller and passed in, so several stores and
 * projects can share one pool without a process-wide handle.
 *
 * Every node carries `_uid` (project, label and natural key) under a
 * uniqueness constraint; MERGE on that property makes upserts idempotent.
 *
 * @module
 */

import {
  auth,
  driver as createDriver,
  isInt,
  isNode,
  Neo4jError,
  type Driver,
  type ManagedTransaction,
  type Record as Neo4jRecord,
} from "neo4j-driver";
import {
  ConstraintViolationError,
  ErrorCode,
  MigrationError,
  TransientStoreError,
  isMigrationError,
} from "../errors.js";
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
import { decodeProperties } from "./property-codec.js";
import {
  KEY_PROPERTY,
  UID_PROPERTY,
  buildEdgeQuery,
  buildNodeQuery,
  buildListProjects,
  buildPurgeProject,
  buildSchemaStatements,
  buildRemoveEdge,
  buildTraversalStep,
  buildUpsertEdge,
  buildUpsertNode,
  type BuiltQuery,
} from "./cypher-builder.js";
import { assertValidEdge, assertValidNodeRef, nodeUid } from "./constraints.js";
import { isNodeLabel, isRelationshipType, type RelationshipType } from "./schema.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("neo4j-graph-store");

// =============================================================================
// Configuration
// =============================================================================

export interface Neo4jConnectionConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
  maxConnectionPoolSize?: number;
  connectionTimeoutMs?: number;
}

/**
 * Creates a driver whose integers come back as JS numbers.
 */
export function createNeo4jDriver(config: Neo4jConnectionConfig): Driver {
  return createDriver(config.uri, auth.basic(config.user, config.password), {
    disableLosslessIntegers: true,
    maxConnectionPoolSize: config.maxConnectionPoolSize ?? 50,
    connectionTimeout: config.connectionTimeoutMs ?? 30_000,
  });
}

// =============================================================================
// Result Decoding
// =============================================================================

type AnyQueryResult = QueryResult<NodeRecord> | QueryResult<EdgeRecord> | QueryResult<TraversalRow>;

const TRANSIENT_CODES = new Set(["ServiceUnavailable", "SessionExpired"]);

/**
 * Maps driver failures onto the pipeline's error taxonomy.
 */
export function mapNeo4jError(error: unknown, operation: string): MigrationError {
  if (isMigrationError(error)) return error;

  if (error instanceof Neo4jError) {
    const context = { operation, neo4jCode: error.code };
    if (TRANSIENT_CODES.has(error.code) || error.code.startsWith("Neo.TransientError")) {
      return new TransientStoreError(`Neo4j unavailable during ${operation}: ${error.message}`, undefined, context);
    }
    if (error.code === "Neo.ClientError.Schema.ConstraintValidationFailed") {
      return new ConstraintViolationError(`Constraint violated during ${operation}: ${error.message}`, undefined, context);
    }
    return new MigrationError(`Neo4j error during ${operation}: ${error.message}`, ErrorCode.UNKNOWN_ERROR, context);
  }

  if (error instanceof Error) {
    return new TransientStoreError(`Neo4j request failed during ${operation}: ${error.message}`, undefined, {
      operation,
      originalError: error.name,
    });
  }
  return new MigrationError(`Neo4j request failed during ${operation}`);
}

function normalize(value: unknown): unknown {
  if (isInt(value)) return value.toNumber();
  if (Array.isArray(value)) return value.map(normalize);
  return value;
}

function asNumber(value: unknown): number {
  const normalized = normalize(value);
  return typeof normalized === "number" ? normalized : 0;
}

function toNodeRecord(value: unknown): NodeRecord {
  if (typeof value !== "object" || value === null || !isNode(value)) {
    throw new MigrationError("Expected a node in Neo4j result");
  }
  const label = value.labels.find(isNodeLabel);
  const raw: Record<string, unknown> = {};
  for (const [name, property] of Object.entries(value.properties)) {
    raw[name] = normalize(property);
  }
  const key = raw[KEY_PROPERTY];
  const projectId = raw.project_id;
  if (!label || typeof key !== "string" || typeof projectId !== "string") {
    throw new MigrationError("Neo4j node is missing its label, key or project id");
  }
  delete raw[KEY_PROPERTY];
  delete raw[UID_PROPERTY];
  return { projectId, label, key, properties: decodeProperties(raw) };
}

function toPropertyBag(value: unknown): PropertyBag {
  if (typeof value !== "object" || value === null) return {};
  const raw: Record<string, unknown> = {};
  for (const [name, property] of Object.entries(value)) {
    raw[name] = normalize(property);
  }
  return decodeProperties(raw);
}

function toRelationshipType(value: unknown): RelationshipType {
  if (typeof value === "string" && isRelationshipType(value)) return value;
  throw new MigrationError(`Unknown relationship type in Neo4j result: ${String(value)}`);
}

function stripProperties(record: NodeRecord): NodeRef {
  return { projectId: record.projectId, label: record.label, key: record.key };
}

// =============================================================================
// Statement Runner
// =============================================================================

/**
 * Runs the store's statements on one managed transaction.
 */
class Neo4jTransaction implements ITransaction {
  constructor(private readonly tx: ManagedTransaction) {}

  query(pattern: NodePattern): Promise<QueryResult<NodeRecord>>;
  query(pattern: EdgePattern): Promise<QueryResult<EdgeRecord>>;
  query(pattern: TraversalPattern): Promise<QueryResult<TraversalRow>>;
  async query(pattern: GraphPattern): Promise<AnyQueryResult> {
    const startedAt = Date.now();
    switch (pattern.kind) {
      case "nodes": {
        const records = await this.run(buildNodeQuery(pattern));
        return withStats(records.map((record) => toNodeRecord(record.get("n"))), startedAt);
      }
      case "edges": {
        const records = await this.run(buildEdgeQuery(pattern));
        return withStats(
          records.map((record) => ({
            type: toRelationshipType(record.get("type")),
            from: stripProperties(toNodeRecord(record.get("source"))),
            to: stripProperties(toNodeRecord(record.get("target"))),
            properties: toPropertyBag(record.get("props")),
          })),
          startedAt
        );
      }
      case "traverse":
        return withStats(await this.traverse(pattern), startedAt);
    }
  }

  /**
   * Breadth-first, one statement per hop; `hops` is the shortest distance.
   */
  private async traverse(pattern: TraversalPattern): Promise<TraversalRow[]> {
    if (pattern.types.length === 0) return [];
    const limit = pattern.maxHops ?? Number.POSITIVE_INFINITY;
    const visited = [nodeUid(pattern.start)];
    const rows: TraversalRow[] = [];
    let frontier = [...visited];

    for (let hops = 1; hops <= limit && frontier.length > 0; hops++) {
      const records = await this.run(buildTraversalStep(pattern, frontier, visited));
      frontier = [];
      for (const record of records) {
        const node = toNodeRecord(record.get("n"));
        visited.push(nodeUid(node));
        frontier.push(nodeUid(node));
        rows.push({ node, hops });
      }
    }
    return rows;
  }

  async upsertNode(ref: NodeRef, properties: PropertyBag): Promise<void> {
    assertValidNodeRef(ref);
    await this.run(buildUpsertNode(ref, properties));
  }

  async upsertEdge(type: RelationshipType, from: NodeRef, to: NodeRef, properties: PropertyBag = {}): Promise<void> {
    assertValidEdge(type, from, to);
    const records = await this.run(buildUpsertEdge(type, from, to, properties));
    const written = records.length > 0 ? asNumber(records[0]?.get("written")) : 0;
    if (written === 0) {
      throw new ConstraintViolationError(
        `${type} edge endpoint does not exist: ${from.label} ${from.key} -> ${to.label} ${to.key}`,
        ErrorCode.STORE_MISSING_ENDPOINT,
        { type, from: from.key, to: to.key }
      );
    }
  }

  async removeEdge(type: RelationshipType, from: NodeRef, to: NodeRef): Promise<void> {
    await this.run(buildRemoveEdge(type, from, to));
  }

  async run(statement: BuiltQuery): Promise<Neo4jRecord[]> {
    const result = await this.tx.run(statement.text, statement.params);
    return result.records;
  }
}

function withStats<T>(rows: T[], startedAt: number): QueryResult<T> {
  return { rows, stats: { rowsAffected: rows.length, executionTimeMs: Date.now() - startedAt } };
}

// =============================================================================
// Neo4jGraphStore Implementation
// =============================================================================

/**
 * Neo4j implementation of IGraphStore.
 *
 * @example
 * ```typescript
 * const driver = createNeo4jDriver({ uri: "bolt://localhost:7687", user: "neo4j", password: "test-secret" });
 * const store = new Neo4jGraphStore(driver);
 * await store.initialize();
 * ```
 */
export class Neo4jGraphStore implements IGraphStore {
  private initialized = false;

  constructor(
    private readonly driver: Driver,
    private readonly options: { database?: string } = {}
  ) {}

  get isReady(): boolean {
    return this.initialized;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async initialize(): Promise<void> {
    if (this.initialized) return;

    try {
      await this.driver.verifyConnectivity();
      const session = this.driver.session({ database: this.options.database });
      try {
        for (const statement of buildSchemaStatements()) {
          await session.run(statement);
        }
      } finally {
        await session.close();
      }
    } catch (error) {
      throw mapNeo4jError(error, "initialize");
    }

    this.initialized = true;
    logger.info({ database: this.options.database ?? "default" }, "Neo4j graph store initialized");
  }

  async close(): Promise<void> {
    this.initialized = false;
    await this.driver.close();
  }

  // ===========================================================================
  // Operations
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

  /**
   * Runs `fn` in a managed write transaction. The driver retries the whole
   * function on transient failures, which is safe because every write is
   * an upsert.
   */
  async transaction<T>(fn: (tx: ITransaction) => Promise<T>): Promise<T> {
    const session = this.driver.session({ database: this.options.database });
    try {
      return await session.executeWrite((tx) => fn(new Neo4jTransaction(tx)));
    } catch (error) {
      throw mapNeo4jError(error, "transaction");
    } finally {
      await session.close();
    }
  }

  query(pattern: NodePattern): Promise<QueryResult<NodeRecord>>;
  query(pattern: EdgePattern): Promise<QueryResult<EdgeRecord>>;
  query(pattern: TraversalPattern): Promise<QueryResult<TraversalRow>>;
  async query(pattern: GraphPattern): Promise<AnyQueryResult> {
    const session = this.driver.session({ database: this.options.database });
    try {
      return await session.executeRead(async (tx): Promise<AnyQueryResult> => {
        const reader = new Neo4jTransaction(tx);
        switch (pattern.kind) {
          case "nodes":
            return reader.query(pattern);
          case "edges":
            return reader.query(pattern);
          case "traverse":
            return reader.query(pattern);
        }
      });
    } catch (error) {
      throw mapNeo4jError(error, `query:${pattern.kind}`);
    } finally {
      await session.close();
    }
  }

  async listProjectIds(): Promise<string[]> {
    const statement = buildListProjects();
    const session = this.driver.session({ database: this.options.database });
    try {
      const result = await session.executeRead((tx) => tx.run(statement.text, statement.params));
      return result.records.map((record) => String(record.get("key")));
    } catch (error) {
      throw mapNeo4jError(error, "listProjectIds");
    } finally {
      await session.close();
    }
  }

  async purgeProject(projectId: string): Promise<number> {
    const statement = buildPurgeProject(projectId);
    const session = this.driver.session({ database: this.options.database });
    try {
      const removed = await session.executeWrite(async (tx) => {
        const result = await tx.run(statement.text, statement.params);
        return asNumber(result.records[0]?.get("removed"));
      });
      logger.info({ projectId, nodes: removed }, "Project purged");
      return removed;
    } catch (error) {
      throw mapNeo4jError(error, "purgeProject");
    } finally {
      await session.close();
    }
  }
}
