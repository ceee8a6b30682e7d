/**
 * Cypher Statement Builder
 *
 * Turns store operations into parameterized Cypher. Labels and relationship
 * types come from the closed schema lists and are interpolated; everything
 * else travels as parameters. Property names used in filters are checked
 * against an identifier pattern before they reach the statement text.
 *
 * @module
 */

import { ConstraintViolationError } from "../errors.js";
import type { EdgePattern, NodePattern, NodeRef, TraversalPattern } from "../interfaces/IGraphStore.js";
import type { PropertyBag } from "../../types/entities.js";
import { encodeProperties, encodeValue } from "./property-codec.js";
import { NODE_LABELS, isFunctionalRelationship, type NodeLabel, type RelationshipType } from "./schema.js";
import { nodeUid } from "./constraints.js";

// =============================================================================
// Types
// =============================================================================

export interface BuiltQuery {
  text: string;
  params: Record<string, unknown>;
}

/** Structural properties every stored node carries besides its own bag */
export const UID_PROPERTY = "_uid";
export const KEY_PROPERTY = "_key";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function quote(identifier: string): string {
  return "`" + identifier + "`";
}

function propertyName(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new ConstraintViolationError(`Invalid property name in filter: ${name}`, undefined, { name });
  }
  return quote(name);
}

function relationshipList(types: readonly RelationshipType[]): string {
  return types.map(quote).join("|");
}

// =============================================================================
// Schema
// =============================================================================

/**
 * One uniqueness constraint on the uid and one index on project_id per label.
 */
export function buildSchemaStatements(labels: readonly NodeLabel[] = NODE_LABELS): string[] {
  return labels.flatMap((label) => [
    `CREATE CONSTRAINT ${quote(`${label}_uid`)} IF NOT EXISTS FOR (n:${quote(label)}) REQUIRE n.${UID_PROPERTY} IS UNIQUE`,
    `CREATE INDEX ${quote(`${label}_project`)} IF NOT EXISTS FOR (n:${quote(label)}) ON (n.project_id)`,
  ]);
}

// =============================================================================
// Writes
// =============================================================================

export function buildUpsertNode(ref: NodeRef, properties: PropertyBag): BuiltQuery {
  return {
    text:
      `MERGE (n:${quote(ref.label)} {${UID_PROPERTY}: $uid}) ` +
      `ON CREATE SET n.${KEY_PROPERTY} = $key ` +
      `SET n += $props, n.project_id = $projectId`,
    params: {
      uid: nodeUid(ref),
      key: ref.key,
      projectId: ref.projectId,
      props: encodeProperties(properties),
    },
  };
}

/**
 * Matches both endpoints and merges the edge. Returns one row with
 * `written = 0` when an endpoint is missing. Functional types first drop
 * every other outgoing edge of the same type.
 */
export function buildUpsertEdge(
  type: RelationshipType,
  from: NodeRef,
  to: NodeRef,
  properties: PropertyBag
): BuiltQuery {
  const lines = [
    `OPTIONAL MATCH (a:${quote(from.label)} {${UID_PROPERTY}: $from})`,
    `OPTIONAL MATCH (b:${quote(to.label)} {${UID_PROPERTY}: $to})`,
    `WITH a, b WHERE a IS NOT NULL AND b IS NOT NULL`,
  ];
  if (isFunctionalRelationship(type)) {
    lines.push(
      `OPTIONAL MATCH (a)-[old:${quote(type)}]->(other) WHERE other.${UID_PROPERTY} <> $to`,
      `WITH a, b, collect(old) AS replaced`,
      `FOREACH (r IN replaced | DELETE r)`
    );
  }
  lines.push(`MERGE (a)-[r:${quote(type)}]->(b)`, `SET r += $props`, `RETURN count(r) AS written`);

  return {
    text: lines.join("\n"),
    params: {
      from: nodeUid(from),
      to: nodeUid(to),
      props: encodeProperties(properties),
    },
  };
}

export function buildRemoveEdge(type: RelationshipType, from: NodeRef, to: NodeRef): BuiltQuery {
  return {
    text:
      `MATCH (a:${quote(from.label)} {${UID_PROPERTY}: $from})-[r:${quote(type)}]->` +
      `(b:${quote(to.label)} {${UID_PROPERTY}: $to}) DELETE r`,
    params: { from: nodeUid(from), to: nodeUid(to) },
  };
}

export function buildPurgeProject(projectId: string): BuiltQuery {
  return {
    text: "MATCH (n) WHERE n.project_id = $projectId WITH n, n._uid AS uid DETACH DELETE n RETURN count(uid) AS removed",
    params: { projectId },
  };
}

// =============================================================================
// Reads
// =============================================================================

export function buildListProjects(): BuiltQuery {
  return {
    text: `MATCH (n:${quote("Project")}) RETURN n.${KEY_PROPERTY} AS key ORDER BY key`,
    params: {},
  };
}

export function buildNodeQuery(pattern: NodePattern): BuiltQuery {
  const params: Record<string, unknown> = { projectId: pattern.projectId };
  const conditions = ["n.project_id = $projectId"];

  Object.entries(pattern.where ?? {}).forEach(([name, value], index) => {
    const property = `n.${propertyName(name)}`;
    if (value === null) {
      conditions.push(`(${property} IS NULL OR ${property} = $w${index})`);
    } else {
      conditions.push(`${property} = $w${index}`);
    }
    params[`w${index}`] = encodeValue(value);
  });

  const match = pattern.label ? `MATCH (n:${quote(pattern.label)})` : "MATCH (n)";
  return {
    text: `${match} WHERE ${conditions.join(" AND ")} RETURN n ORDER BY n.${KEY_PROPERTY}`,
    params,
  };
}

export function buildEdgeQuery(pattern: EdgePattern): BuiltQuery {
  const params: Record<string, unknown> = { projectId: pattern.projectId };
  const conditions = ["a.project_id = $projectId"];

  if (pattern.types && pattern.types.length > 0) {
    conditions.push("type(r) IN $types");
    params.types = pattern.types;
  }
  if (pattern.from) {
    conditions.push(`a.${UID_PROPERTY} = $from`);
    params.from = nodeUid(pattern.from);
  }
  if (pattern.to) {
    conditions.push(`b.${UID_PROPERTY} = $to`);
    params.to = nodeUid(pattern.to);
  }

  const source = pattern.fromLabel ? `(a:${quote(pattern.fromLabel)})` : "(a)";
  const target = pattern.toLabel ? `(b:${quote(pattern.toLabel)})` : "(b)";
  return {
    text:
      `MATCH ${source}-[r]->${target} WHERE ${conditions.join(" AND ")} ` +
      "RETURN a AS source, type(r) AS type, properties(r) AS props, b AS target " +
      `ORDER BY a.${KEY_PROPERTY}, type(r), b.${KEY_PROPERTY}`,
    params,
  };
}

/**
 * One breadth-first step: the unvisited neighbours of the frontier uids.
 */
export function buildTraversalStep(
  pattern: TraversalPattern,
  frontier: readonly string[],
  visited: readonly string[]
): BuiltQuery {
  const relationship = `[:${relationshipList(pattern.types)}]`;
  const path = pattern.direction === "in" ? `<-${relationship}-` : `-${relationship}->`;

  return {
    text:
      `MATCH (s)${path}(n) ` +
      `WHERE s.${UID_PROPERTY} IN $frontier AND NOT n.${UID_PROPERTY} IN $visited ` +
      `RETURN DISTINCT n ORDER BY n.${KEY_PROPERTY}`,
    params: { frontier: [...frontier], visited: [...visited] },
  };
}
