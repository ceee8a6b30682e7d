/**
 * Natural keys and typed reads over IGraphStore
 *
 * @module
 */

import type { z } from "zod";
import { ConstraintViolationError } from "../errors.js";
import type { IGraphReader, IGraphWriter, NodeRecord, NodeRef } from "../interfaces/IGraphStore.js";
import { ProjectSchema, type ProjectEntity } from "../../types/entities.js";
import type { NodeLabel } from "./schema.js";

// =============================================================================
// Natural Keys
// =============================================================================

export const keys = {
  function: (filePath: string, name: string) => `${filePath}#fn:${name}`,
  class: (filePath: string, name: string) => `${filePath}#class:${name}`,
  enum: (filePath: string, name: string) => `${filePath}#enum:${name}`,
  extension: (filePath: string, baseType: string) => `${filePath}#ext:${baseType}`,
  component: (filePath: string) => `component:${filePath}`,
  dependency: (name: string) => `dependency:${name}`,
  mapping: (sourceKey: string) => `mapping:${sourceKey}`,
  target: (type: string, name: string) => `target:${type}:${name}`,
  strategy: (filePath: string) => `strategy:${filePath}`,
  report: (kind: string, subject: string) => `report:${kind}:${subject}`,
  feedback: (kind: string, subject: string) => `feedback:${kind}:${subject}`,
};

export function nodeRef(projectId: string, label: NodeLabel, key: string): NodeRef {
  return { projectId, label, key };
}

export function projectRef(projectId: string): NodeRef {
  return { projectId, label: "Project", key: projectId };
}

export function fileRef(projectId: string, filePath: string): NodeRef {
  return { projectId, label: "File", key: filePath };
}

// =============================================================================
// Typed Reads
// =============================================================================

export interface TypedNode<T> {
  ref: NodeRef;
  entity: T;
  /** Full property bag, including properties the schema does not name */
  properties: NodeRecord["properties"];
}

/**
 * Parses a stored node against its entity schema.
 *
 * @throws ConstraintViolationError when the stored properties don't fit
 */
export function parseNode<S extends z.ZodTypeAny>(record: NodeRecord, schema: S): TypedNode<z.infer<S>> {
  const parsed = schema.safeParse(record.properties);
  if (!parsed.success) {
    throw new ConstraintViolationError(`Stored ${record.label} ${record.key} does not match its schema`, undefined, {
      label: record.label,
      key: record.key,
      issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return {
    ref: { projectId: record.projectId, label: record.label, key: record.key },
    entity: parsed.data,
    properties: record.properties,
  };
}

export async function readNodes<S extends z.ZodTypeAny>(
  reader: IGraphReader,
  projectId: string,
  label: NodeLabel,
  schema: S
): Promise<TypedNode<z.infer<S>>[]> {
  const { rows } = await reader.query({ kind: "nodes", projectId, label });
  return rows.map((row) => parseNode(row, schema));
}

/** Nodes a later run no longer produced carry `stale: true` */
export function isLive(node: Pick<NodeRecord, "properties">): boolean {
  return node.properties.stale !== true;
}

export async function readLiveNodes<S extends z.ZodTypeAny>(
  reader: IGraphReader,
  projectId: string,
  label: NodeLabel,
  schema: S
): Promise<TypedNode<z.infer<S>>[]> {
  return (await readNodes(reader, projectId, label, schema)).filter(isLive);
}

/**
 * Marks every live `label` node whose key is not in `current` as stale.
 *
 * @returns number of nodes newly marked
 */
export async function markStaleExcept(
  tx: IGraphReader & IGraphWriter,
  projectId: string,
  label: NodeLabel,
  current: ReadonlySet<string>
): Promise<number> {
  const { rows } = await tx.query({ kind: "nodes", projectId, label });
  let marked = 0;
  for (const row of rows) {
    if (current.has(row.key) || !isLive(row)) continue;
    await tx.upsertNode(nodeRef(projectId, label, row.key), { stale: true });
    marked++;
  }
  return marked;
}

export async function getProject(reader: IGraphReader, projectId: string): Promise<ProjectEntity | null> {
  const { rows } = await reader.query({ kind: "nodes", projectId, label: "Project" });
  const row = rows.find((candidate) => candidate.key === projectId);
  return row ? parseNode(row, ProjectSchema).entity : null;
}
