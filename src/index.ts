/**
 * migration-graph
 *
 * Library entry point. The CLI lives in ./cli.
 *
 * @module
 */

export * from "./core/index.js";
export { createLogger, type Logger, type LogLevel } from "./utils/logger.js";
export {
  PipelineConfigSchema,
  type PipelineConfig,
  type GraphStoreConfig,
  type InferenceConfig,
  type RetryConfig,
  type ExtractionConfig,
} from "./utils/validation.js";
