/**
 * Graph Export
 *
 * Snapshots a project's subgraph as JSON or as a pair of CSV files, and
 * restores snapshots into a store. Properties travel as stored, including
 * keys no entity schema names.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { z } from "zod";
import type { IGraphReader, IGraphStore, NodeRef } from "../interfaces/IGraphStore.js";
import { NODE_LABELS, RELATIONSHIP_TYPES, SCHEMA_VERSION, type NodeLabel, type RelationshipType } from "../graph/schema.js";
import { ConfigurationError, ErrorCode } from "../errors.js";
import { PropertyBagSchema, type PropertyBag } from "../../types/entities.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("graph-export");

// =============================================================================
// Snapshot Format
// =============================================================================

const EndpointSchema = z.object({
  label: z.enum(NODE_LABELS),
  key: z.string(),
});

export const SnapshotNodeSchema = z.object({
  label: z.enum(NODE_LABELS),
  key: z.string(),
  properties: PropertyBagSchema,
});

export const SnapshotEdgeSchema = z.object({
  type: z.enum(RELATIONSHIP_TYPES),
  from: EndpointSchema,
  to: EndpointSchema,
  properties: PropertyBagSchema,
});

export const GraphSnapshotSchema = z.object({
  schema_version: z.number().int(),
  project_id: z.string(),
  exported_at: z.string(),
  nodes: z.array(SnapshotNodeSchema),
  edges: z.array(SnapshotEdgeSchema),
});

export type SnapshotNode = z.infer<typeof SnapshotNodeSchema>;
export type SnapshotEdge = z.infer<typeof SnapshotEdgeSchema>;
export type GraphSnapshot = z.infer<typeof GraphSnapshotSchema>;

export interface SnapshotFilter {
  /** Node labels to keep; edges are kept only when both endpoints are */
  labels?: readonly NodeLabel[];
  types?: readonly RelationshipType[];
  /** Keep nodes marked stale, and edges touching them (default false) */
  includeStale?: boolean;
}

export type ExportFormat = "json" | "csv";

/** Added by every store on write; not part of the exported bag */
const STORE_PROPERTIES = new Set(["project_id"]);

function withoutStoreProperties(properties: PropertyBag): PropertyBag {
  return Object.fromEntries(Object.entries(properties).filter(([key]) => !STORE_PROPERTIES.has(key)));
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// =============================================================================
// Export
// =============================================================================

export async function exportSnapshot(
  reader: IGraphReader,
  projectId: string,
  filter: SnapshotFilter = {},
  now: Date = new Date()
): Promise<GraphSnapshot> {
  const labels = filter.labels ? new Set(filter.labels) : null;
  const includeStale = filter.includeStale ?? false;
  const [nodeResult, edgeResult] = await Promise.all([
    reader.query({ kind: "nodes", projectId }),
    reader.query({ kind: "edges", projectId, types: filter.types ? [...filter.types] : undefined }),
  ]);

  const stale = new Set(
    nodeResult.rows.filter((row) => row.properties.stale === true).map((row) => `${row.label}:${row.key}`)
  );
  const keep = (label: NodeLabel, key: string): boolean =>
    (labels === null || labels.has(label)) && (includeStale || !stale.has(`${label}:${key}`));

  const nodes: SnapshotNode[] = nodeResult.rows
    .filter((row) => keep(row.label, row.key))
    .map((row) => ({ label: row.label, key: row.key, properties: withoutStoreProperties(row.properties) }))
    .sort((a, b) => compareText(a.label, b.label) || compareText(a.key, b.key));

  const edges: SnapshotEdge[] = edgeResult.rows
    .filter((row) => keep(row.from.label, row.from.key) && keep(row.to.label, row.to.key))
    .map((row) => ({
      type: row.type,
      from: { label: row.from.label, key: row.from.key },
      to: { label: row.to.label, key: row.to.key },
      properties: row.properties,
    }))
    .sort(
      (a, b) =>
        compareText(a.type, b.type) ||
        compareText(`${a.from.label}:${a.from.key}`, `${b.from.label}:${b.from.key}`) ||
        compareText(`${a.to.label}:${a.to.key}`, `${b.to.label}:${b.to.key}`)
    );

  return { schema_version: SCHEMA_VERSION, project_id: projectId, exported_at: now.toISOString(), nodes, edges };
}

// =============================================================================
// CSV
// =============================================================================

export const NODE_CSV_HEADER = ["label", "key", "properties"] as const;
export const EDGE_CSV_HEADER = ["type", "from_label", "from_key", "to_label", "to_key", "properties"] as const;

/**
 * RFC 4180 field: quoted when it holds a comma, quote or line break.
 */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csvLine(fields: readonly string[]): string {
  return fields.map(csvField).join(",");
}

export function toCsv(snapshot: GraphSnapshot): { nodes: string; edges: string } {
  const nodeLines = [
    csvLine(NODE_CSV_HEADER),
    ...snapshot.nodes.map((node) => csvLine([node.label, node.key, JSON.stringify(node.properties)])),
  ];
  const edgeLines = [
    csvLine(EDGE_CSV_HEADER),
    ...snapshot.edges.map((edge) =>
      csvLine([edge.type, edge.from.label, edge.from.key, edge.to.label, edge.to.key, JSON.stringify(edge.properties)])
    ),
  ];
  return { nodes: nodeLines.join("\n") + "\n", edges: edgeLines.join("\n") + "\n" };
}

/**
 * Writes `snapshot` as `<target>` (json) or as nodes.csv and edges.csv in
 * the `<target>` directory (csv).
 *
 * @returns paths written
 */
export async function writeSnapshot(snapshot: GraphSnapshot, target: string, format: ExportFormat): Promise<string[]> {
  if (format === "json") {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, JSON.stringify(snapshot, null, 2) + "\n", "utf-8");
    logger.info({ target, nodes: snapshot.nodes.length, edges: snapshot.edges.length }, "snapshot written");
    return [target];
  }

  const csv = toCsv(snapshot);
  const nodesPath = path.join(target, "nodes.csv");
  const edgesPath = path.join(target, "edges.csv");
  await fs.mkdir(target, { recursive: true });
  await fs.writeFile(nodesPath, csv.nodes, "utf-8");
  await fs.writeFile(edgesPath, csv.edges, "utf-8");
  logger.info({ target, nodes: snapshot.nodes.length, edges: snapshot.edges.length }, "csv export written");
  return [nodesPath, edgesPath];
}

// =============================================================================
// Import
// =============================================================================

/**
 * Parses a snapshot read from disk.
 *
 * @throws ConfigurationError when the document is not a snapshot
 */
export function parseSnapshot(data: unknown): GraphSnapshot {
  const parsed = GraphSnapshotSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError("Not a graph snapshot", ErrorCode.CONFIG_INVALID, {
      issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  if (parsed.data.schema_version !== SCHEMA_VERSION) {
    throw new ConfigurationError(
      `Snapshot schema version ${parsed.data.schema_version} does not match ${SCHEMA_VERSION}`,
      ErrorCode.CONFIG_INVALID
    );
  }
  return parsed.data;
}

/**
 * Restores a snapshot in one transaction, nodes before edges. Upserts make
 * a repeated import a no-op. `projectId` re-homes the snapshot under
 * another project id.
 */
export async function importSnapshot(
  store: IGraphStore,
  snapshot: GraphSnapshot,
  projectId: string = snapshot.project_id
): Promise<{ nodes: number; edges: number }> {
  const ref = (endpoint: { label: NodeLabel; key: string }): NodeRef => ({
    projectId,
    label: endpoint.label,
    // The project node's key is its id
    key: endpoint.label === "Project" ? projectId : endpoint.key,
  });

  await store.transaction(async (tx) => {
    for (const node of snapshot.nodes) {
      const properties = node.label === "Project" ? { ...node.properties, id: projectId } : node.properties;
      await tx.upsertNode(ref(node), properties);
    }
    for (const edge of snapshot.edges) {
      await tx.upsertEdge(edge.type, ref(edge.from), ref(edge.to), edge.properties);
    }
  });

  logger.info({ projectId, nodes: snapshot.nodes.length, edges: snapshot.edges.length }, "snapshot imported");
  return { nodes: snapshot.nodes.length, edges: snapshot.edges.length };
}
