/**
 * IInferenceService - Semantic inference capability
 *
 * Answers the questions static parsing cannot: ambiguous class kinds,
 * decorator semantics, import targets, whole files in languages without a
 * grammar, component classification and type mapping.
 *
 * Every call is bounded by a timeout. Any failure, including an answer
 * that does not validate, surfaces as TransientInferenceError; callers skip
 * the affected field and record Feedback. Answers are recorded, never
 * verified.
 *
 * @module
 */

import { z } from "zod";
import { COMPONENT_TYPES, type ComponentType } from "../../types/entities.js";
import type { Skeleton } from "../../types/skeleton.js";

// =============================================================================
// Field Inference
// =============================================================================

/**
 * Field keys:
 * - `class:<Name>:kind` - open kind tag (plain, singleton, abstract, ...)
 * - `decorator:<@name>` - one-line meaning of a decorator
 * - `import:<module>` - project-relative path the import points to
 */
export interface InferFieldsRequest {
  filePath: string;
  language: string;
  skeleton: Skeleton;
  fields: string[];
}

export const InferFieldsResponseSchema = z.object({
  fields: z.record(z.string().nullable()),
});

export type InferFieldsResponse = z.infer<typeof InferFieldsResponseSchema>;

// =============================================================================
// Whole-file Inference
// =============================================================================

export interface InferSkeletonRequest {
  filePath: string;
  language: string;
  /** Already truncated to the configured input limit */
  content: string;
}

const InferredFunctionSchema = z.object({
  name: z.string().min(1),
  return_type: z.string().nullable().default(null),
  arguments: z.array(z.object({ name: z.string(), type: z.string().nullable().default(null) })).default([]),
  decorators: z.array(z.string()).default([]),
  is_static: z.boolean().default(false),
  is_async: z.boolean().default(false),
  docstring: z.string().nullable().default(null),
});

export const InferSkeletonResponseSchema = z.object({
  functions: z.array(InferredFunctionSchema).default([]),
  classes: z
    .array(
      z.object({
        name: z.string().min(1),
        type: z.string().nullable().default(null),
        superclasses: z.array(z.string()).default([]),
        methods: z.array(InferredFunctionSchema).default([]),
        attributes: z
          .array(
            z.object({
              name: z.string(),
              type: z.string().nullable().default(null),
              visibility: z.enum(["public", "protected", "private"]).default("public"),
            })
          )
          .default([]),
        docstring: z.string().nullable().default(null),
      })
    )
    .default([]),
  enums: z
    .array(z.object({ name: z.string().min(1), values: z.array(z.string()).default([]), docstring: z.string().nullable().default(null) }))
    .default([]),
  imports: z.array(z.string()).default([]),
});

export type InferSkeletonResponse = z.infer<typeof InferSkeletonResponseSchema>;

// =============================================================================
// Classification
// =============================================================================

export interface ClassifyRequest {
  filePath: string;
  language: string;
  /** Signals collected by the rule pass, possibly tied */
  signals: string[];
  /** Declared names and imported modules */
  summary: { functions: string[]; classes: string[]; enums: string[]; imports: string[] };
}

export const ClassifyResponseSchema = z.object({
  type: z.enum(COMPONENT_TYPES),
  reason: z.string().optional(),
});

export type ClassifyResponse = { type: ComponentType; reason?: string };

// =============================================================================
// Type Mapping
// =============================================================================

export interface MapTypeRequest {
  sourceLanguage: string;
  targetLanguage: string;
  targetFramework: string | null;
  typeName: string;
  filePath: string;
}

export const MapTypeResponseSchema = z.object({
  /** null when the model finds no equivalent */
  target_type: z.string().min(1).nullable(),
});

export type MapTypeResponse = z.infer<typeof MapTypeResponseSchema>;

// =============================================================================
// Service
// =============================================================================

export interface IInferenceService {
  readonly model: string;

  inferFields(request: InferFieldsRequest): Promise<InferFieldsResponse>;

  inferSkeleton(request: InferSkeletonRequest): Promise<InferSkeletonResponse>;

  classify(request: ClassifyRequest): Promise<ClassifyResponse>;

  mapType(request: MapTypeRequest): Promise<MapTypeResponse>;
}
