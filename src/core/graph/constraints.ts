/**
 * Write validation shared by every graph store
 *
 * @module
 */

import { ConstraintViolationError, ErrorCode } from "../errors.js";
import type { NodeRef } from "../interfaces/IGraphStore.js";
import { RELATIONSHIPS, type RelationshipType } from "./schema.js";

export function nodeUid(ref: NodeRef): string {
  return `${ref.projectId}::${ref.label}::${ref.key}`;
}

export function edgeUid(type: RelationshipType, from: NodeRef, to: NodeRef): string {
  return `${nodeUid(from)}-[${type}]->${nodeUid(to)}`;
}

export function sameNode(a: NodeRef, b: NodeRef): boolean {
  return a.projectId === b.projectId && a.label === b.label && a.key === b.key;
}

export function assertValidNodeRef(ref: NodeRef): void {
  if (ref.projectId.length === 0 || ref.key.length === 0) {
    throw new ConstraintViolationError("Node natural key and project id must be non-empty", undefined, {
      label: ref.label,
      key: ref.key,
      projectId: ref.projectId,
    });
  }
}

/**
 * Rejects edges that cross projects or connect labels the relationship
 * type does not allow.
 */
export function assertValidEdge(type: RelationshipType, from: NodeRef, to: NodeRef): void {
  assertValidNodeRef(from);
  assertValidNodeRef(to);

  if (from.projectId !== to.projectId) {
    throw new ConstraintViolationError(
      `${type} edge crosses projects (${from.projectId} -> ${to.projectId})`,
      ErrorCode.STORE_CROSS_PROJECT_EDGE,
      { type, from: nodeUid(from), to: nodeUid(to) }
    );
  }

  const definition = RELATIONSHIPS[type];
  if (!definition.from.includes(from.label) || !definition.to.includes(to.label)) {
    throw new ConstraintViolationError(`${type} cannot connect ${from.label} to ${to.label}`, undefined, {
      type,
      from: nodeUid(from),
      to: nodeUid(to),
    });
  }
}

export function missingEndpointError(type: RelationshipType, missing: NodeRef): ConstraintViolationError {
  return new ConstraintViolationError(
    `${type} edge endpoint does not exist: ${missing.label} ${missing.key}`,
    ErrorCode.STORE_MISSING_ENDPOINT,
    { type, missing: nodeUid(missing) }
  );
}
