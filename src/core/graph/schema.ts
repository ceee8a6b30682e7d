/**
 * Graph Schema Definitions
 *
 * Node labels, relationship types and the endpoint rules every store
 * enforces. Properties are open: the schema names only the structural
 * parts of the graph.
 *
 * @module
 */

// =============================================================================
// Schema Version
// =============================================================================

/**
 * Increment when a change to labels, relationship types or natural keys
 * makes existing graphs unreadable.
 */
export const SCHEMA_VERSION = 1;

// =============================================================================
// Labels & Relationship Types
// =============================================================================

export const NODE_LABELS = [
  "Project",
  "File",
  "Function",
  "Class",
  "Enum",
  "Extension",
  "Component",
  "Dependency",
  "Mapping",
  "TargetComponent",
  "Strategy",
  "Report",
  "Feedback",
] as const;

export type NodeLabel = (typeof NODE_LABELS)[number];

export const RELATIONSHIP_TYPES = [
  "CONTAINS",
  "HAS_FUNCTION",
  "HAS_CLASS",
  "HAS_ENUM",
  "HAS_EXTENSION",
  "IMPORTS",
  "REFERENCES",
  "DEPENDS_ON",
  "CLASSIFIES_AS",
  "MAPS_TO",
  "TARGETS",
  "PLANNED_IN",
  "REPORTED_IN",
  "FEEDBACK_FOR",
] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

export function isNodeLabel(value: string): value is NodeLabel {
  return NODE_LABELS.some((label) => label === value);
}

export function isRelationshipType(value: string): value is RelationshipType {
  return RELATIONSHIP_TYPES.some((type) => type === value);
}

// =============================================================================
// Relationship Endpoints
// =============================================================================

export interface RelationshipDefinition {
  from: readonly NodeLabel[];
  to: readonly NodeLabel[];
  /** At most one outgoing edge of this type per source node */
  functional?: boolean;
}

export const RELATIONSHIPS: Record<RelationshipType, RelationshipDefinition> = {
  CONTAINS: { from: ["Project"], to: ["File"] },
  HAS_FUNCTION: { from: ["File"], to: ["Function"] },
  HAS_CLASS: { from: ["File"], to: ["Class"] },
  HAS_ENUM: { from: ["File"], to: ["Enum"] },
  HAS_EXTENSION: { from: ["File"], to: ["Extension"] },
  IMPORTS: { from: ["File"], to: ["File"] },
  REFERENCES: { from: ["File"], to: ["File"] },
  DEPENDS_ON: { from: ["File"], to: ["Dependency"] },
  CLASSIFIES_AS: { from: ["File"], to: ["Component"], functional: true },
  MAPS_TO: { from: ["Component", "Function", "Class", "Extension"], to: ["Mapping"] },
  TARGETS: { from: ["Mapping"], to: ["TargetComponent"] },
  PLANNED_IN: { from: ["Component"], to: ["Strategy"] },
  REPORTED_IN: { from: ["Project"], to: ["Report"] },
  FEEDBACK_FOR: { from: ["Project"], to: ["Feedback"] },
};

export type FileChildLabel = "Function" | "Class" | "Enum" | "Extension";

/**
 * Entities owned by a File through a HAS_* edge
 */
export const FILE_CHILD_RELATIONSHIPS: Readonly<Record<FileChildLabel, RelationshipType>> = {
  Function: "HAS_FUNCTION",
  Class: "HAS_CLASS",
  Enum: "HAS_ENUM",
  Extension: "HAS_EXTENSION",
};

export function isFunctionalRelationship(type: RelationshipType): boolean {
  return RELATIONSHIPS[type].functional === true;
}
