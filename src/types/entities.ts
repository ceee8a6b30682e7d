/**
 * Entity Model
 *
 * Typed records stored as graph nodes. Every record is a set of named
 * fields plus whatever extra properties a producer attached; extra keys are
 * kept by the stores and by export. The schemas below name the fields the
 * pipeline reads; the raw bag stays available next to the parsed entity.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Open Property Values
// =============================================================================

export type PropertyValue =
  | string
  | number
  | boolean
  | null
  | PropertyValue[]
  | { [key: string]: PropertyValue };

export type PropertyBag = { [key: string]: PropertyValue };

export const PropertyValueSchema: z.ZodType<PropertyValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(PropertyValueSchema),
    z.record(PropertyValueSchema),
  ])
);

export const PropertyBagSchema: z.ZodType<PropertyBag> = z.record(PropertyValueSchema);

// =============================================================================
// Provenance
// =============================================================================

/**
 * Which producer supplied a field: the parser, the inference capability, or
 * a fallback applied when neither did
 */
export const ProvenanceSchema = z.enum(["syntax", "inference", "default"]);
export type Provenance = z.infer<typeof ProvenanceSchema>;

export const FieldConflictSchema = z.object({
  field: z.string(),
  syntax: PropertyValueSchema,
  inference: PropertyValueSchema,
  winner: ProvenanceSchema,
});
export type FieldConflict = z.infer<typeof FieldConflictSchema>;

// =============================================================================
// Project
// =============================================================================

export const PROJECT_STATUSES = [
  "uploaded",
  "structure_analyzed",
  "content_analyzed",
  "classified",
  "mapped",
  "strategized",
  "done",
  "needs_feedback",
  "failed",
] as const;

export const ProjectStatusSchema = z.enum(PROJECT_STATUSES);
export type ProjectStatus = z.infer<typeof ProjectStatusSchema>;

export const ProjectSchema = z.object({
  id: z.string(),
  name: z.string(),
  source_dir: z.string(),
  output_dir: z.string().nullable(),
  status: ProjectStatusSchema,
  /** Last stage whose writes committed; differs from status once failed */
  last_committed: ProjectStatusSchema,
  /** Stage after which needs_feedback was entered */
  feedback_after: ProjectStatusSchema.nullable(),
  progress: z.number(),
  current_step: z.string(),
  source_language: z.string().nullable(),
  target_language: z.string(),
  target_framework: z.string().nullable(),
  description: z.string().nullable(),
  custom_mappings: z.record(z.string()),
  failure_reason: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type ProjectEntity = z.infer<typeof ProjectSchema>;

// =============================================================================
// Structural Entities
// =============================================================================

/**
 * A cross-file link recorded during extraction and resolved once every File
 * node exists. Candidates are project-relative paths in preference order.
 */
export const PendingLinkSchema = z.object({
  module: z.string(),
  candidates: z.array(z.string()),
  relative: z.boolean(),
});
export type PendingLink = z.infer<typeof PendingLinkSchema>;

export const ParseStatusSchema = z.enum(["pending", "parsed", "inferred", "malformed", "skipped"]);
export type ParseStatus = z.infer<typeof ParseStatusSchema>;

export const FileSchema = z.object({
  path: z.string(),
  language: z.string(),
  size: z.number(),
  hash: z.string(),
  discovery_index: z.number(),
  parse_status: ParseStatusSchema,
  pending_imports: z.array(PendingLinkSchema),
  pending_references: z.array(PendingLinkSchema),
});
export type FileEntity = z.infer<typeof FileSchema>;

export const ArgumentSchema = z.object({
  name: z.string(),
  type: z.string(),
});
export type ArgumentEntry = z.infer<typeof ArgumentSchema>;

export const FunctionSchema = z.object({
  id: z.string(),
  name: z.string(),
  file_path: z.string(),
  return_type: z.string(),
  arguments: z.array(ArgumentSchema),
  decorators: z.array(z.string()),
  is_static: z.boolean(),
  is_async: z.boolean(),
  docstring: z.string().nullable(),
  line_start: z.number(),
  line_end: z.number(),
  provenance: z.record(ProvenanceSchema),
  stale: z.boolean(),
});
export type FunctionEntity = z.infer<typeof FunctionSchema>;

export const MethodSchema = z.object({
  name: z.string(),
  return_type: z.string(),
  arguments: z.array(ArgumentSchema),
  decorators: z.array(z.string()),
  is_static: z.boolean(),
  is_async: z.boolean(),
});
export type MethodEntry = z.infer<typeof MethodSchema>;

export const AttributeSchema = z.object({
  name: z.string(),
  type: z.string(),
  visibility: z.string(),
});
export type AttributeEntry = z.infer<typeof AttributeSchema>;

export const ClassSchema = z.object({
  id: z.string(),
  name: z.string(),
  file_path: z.string(),
  /** Open tag: plain, singleton, abstract, interface, or anything inference reports */
  type: z.string(),
  is_static: z.boolean(),
  is_final: z.boolean(),
  superclasses: z.array(z.string()),
  interfaces: z.array(z.string()),
  methods: z.array(MethodSchema),
  attributes: z.array(AttributeSchema),
  decorators: z.array(z.string()),
  docstring: z.string().nullable(),
  line_start: z.number(),
  line_end: z.number(),
  provenance: z.record(ProvenanceSchema),
  conflicts: z.array(FieldConflictSchema),
  stale: z.boolean(),
});
export type ClassEntity = z.infer<typeof ClassSchema>;

export const EnumSchema = z.object({
  id: z.string(),
  name: z.string(),
  file_path: z.string(),
  values: z.array(z.string()),
  docstring: z.string().nullable(),
  provenance: z.record(ProvenanceSchema),
  stale: z.boolean(),
});
export type EnumEntity = z.infer<typeof EnumSchema>;

export const ExtensionSchema = z.object({
  id: z.string(),
  name: z.string(),
  file_path: z.string(),
  base_type: z.string(),
  methods: z.array(z.string()),
  provenance: z.record(ProvenanceSchema),
  stale: z.boolean(),
});
export type ExtensionEntity = z.infer<typeof ExtensionSchema>;

// =============================================================================
// Derived Entities
// =============================================================================

export const COMPONENT_TYPES = ["ui", "logic", "data", "config", "unknown"] as const;
export const ComponentTypeSchema = z.enum(COMPONENT_TYPES);
export type ComponentType = z.infer<typeof ComponentTypeSchema>;

export const ComponentSchema = z.object({
  id: z.string(),
  file_path: z.string(),
  type: ComponentTypeSchema,
  signals: z.array(z.string()),
  provenance: ProvenanceSchema,
});
export type ComponentEntity = z.infer<typeof ComponentSchema>;

export const DependencySchema = z.object({
  id: z.string(),
  name: z.string(),
  version: z.string().nullable(),
  type: z.enum(["external", "internal"]),
});
export type DependencyEntity = z.infer<typeof DependencySchema>;

export const TargetComponentSchema = z.object({
  id: z.string(),
  name: z.string(),
  version: z.string().nullable(),
  type: z.string(),
});
export type TargetComponentEntity = z.infer<typeof TargetComponentSchema>;

export const MappingSchema = z.object({
  id: z.string(),
  source_ref: z.string(),
  target_ref: z.string(),
  file_path: z.string(),
  /** Legacy construct the mapping replaces, null for a whole component */
  construct: z.string().nullable(),
  data_type_mapping: z.record(z.string()),
  is_custom: z.boolean(),
  unresolved: z.array(z.string()),
  provenance: ProvenanceSchema,
});
export type MappingEntity = z.infer<typeof MappingSchema>;

export const StrategySchema = z.object({
  id: z.string(),
  component_ref: z.string(),
  file_path: z.string(),
  priority: z.number(),
  actions: z.array(z.string()),
  /** Files this component waits on after cycle breaking */
  depends_on: z.array(z.string()),
});
export type StrategyEntity = z.infer<typeof StrategySchema>;

// =============================================================================
// Audit Trail
// =============================================================================

/**
 * One entry per (type, subject). A later occurrence replaces message and
 * details; `created_at` is the first sighting, `updated_at` the latest.
 */
export const ReportSchema = z.object({
  id: z.string(),
  type: z.string(),
  subject: z.string(),
  message: z.string(),
  details: PropertyBagSchema,
  created_at: z.string(),
  updated_at: z.string(),
});
export type ReportEntity = z.infer<typeof ReportSchema>;

export const FeedbackSchema = z.object({
  id: z.string(),
  kind: z.string(),
  subject: z.string(),
  issue: z.string(),
  suggestion: z.string().nullable(),
  component: z.string().nullable(),
  details: PropertyBagSchema,
  resolution: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type FeedbackEntity = z.infer<typeof FeedbackSchema>;
