/**
 * Runtime Validation Schemas
 *
 * Zod schemas for the pipeline configuration plus small helpers for
 * turning validation failures into readable messages.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Graph Store
// =============================================================================

export const Neo4jConfigSchema = z.object({
  uri: z.string().min(1).default("bolt://localhost:7687"),
  user: z.string().min(1).default("neo4j"),
  password: z.string().default(""),
  database: z.string().optional(),
  maxConnectionPoolSize: z.number().int().positive().default(50),
  connectionTimeoutMs: z.number().int().positive().default(30000),
});

export const GraphStoreConfigSchema = z.object({
  /** "memory" keeps the graph in process; "neo4j" persists it */
  backend: z.enum(["memory", "neo4j"]).default("memory"),
  neo4j: Neo4jConfigSchema.default({}),
});

export type GraphStoreConfig = z.infer<typeof GraphStoreConfigSchema>;

// =============================================================================
// Inference
// =============================================================================

export const InferenceConfigSchema = z.object({
  /** Inference is skipped entirely when disabled or when no key is set */
  enabled: z.boolean().default(true),
  apiKey: z.string().optional(),
  baseUrl: z.string().url().optional(),
  model: z.string().min(1).default("gpt-4o-mini"),
  timeoutMs: z.number().int().positive().default(60000),
  /** Attempts per call, timeouts and client failures included */
  maxAttempts: z.number().int().positive().default(3),
  retryDelayMs: z.number().int().nonnegative().default(500),
  maxTokens: z.number().int().positive().default(2048),
  temperature: z.number().min(0).max(2).default(0.1),
  /** Content sent for whole-file inference is cut to this many characters */
  maxInputChars: z.number().int().positive().default(25000),
});

export type InferenceConfig = z.infer<typeof InferenceConfigSchema>;

// =============================================================================
// Pipeline
// =============================================================================

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  initialDelayMs: z.number().int().nonnegative().default(500),
  maxDelayMs: z.number().int().positive().default(10000),
  backoffFactor: z.number().min(1).default(2),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const ExtractionConfigSchema = z.object({
  /** Files parsed and inferred in parallel */
  concurrency: z.number().int().positive().default(4),
  /** Files above this size in bytes are recorded but not analysed */
  maxFileSize: z.number().int().positive().default(500 * 1024),
  ignorePatterns: z.array(z.string()).default([]),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

export const AnalysisConfigSchema = z.object({
  /** Depth of the reporting closure; planning always uses the full closure */
  closureDepth: z.number().int().positive().default(3),
});

export const PipelineConfigSchema = z.object({
  store: GraphStoreConfigSchema.default({}),
  inference: InferenceConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
  analysis: AnalysisConfigSchema.default({}),
  /** Target stack used when a project does not name one */
  defaultTargetLanguage: z.string().min(1).default("typescript"),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validate data against a schema (throws on failure)
 *
 * @throws {z.ZodError} If validation fails
 */
export function validate<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  return schema.parse(data);
}

/**
 * Format Zod errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.errors.map((e) => {
    const path = e.path.join(".");
    return path ? `${path}: ${e.message}` : e.message;
  });
}
