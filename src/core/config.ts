/**
 * Pipeline configuration
 *
 * Layers, lowest precedence first: schema defaults, `.migration-graph/config.json`,
 * environment variables, explicit overrides.
 *
 * @module
 */

import { ZodError } from "zod";
import { ConfigurationError, ErrorCode } from "./errors.js";
import { getConfigPath, readJson } from "../utils/index.js";
import { PipelineConfigSchema, formatZodErrors, type PipelineConfig } from "../utils/validation.js";

export type Environment = Record<string, string | undefined>;

type ConfigLayer = { [key: string]: unknown };

function isLayer(value: unknown): value is ConfigLayer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge of plain objects; arrays and scalars from `override` replace
 */
export function mergeLayers(base: ConfigLayer, override: ConfigLayer): ConfigLayer {
  const merged: ConfigLayer = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isLayer(current) && isLayer(value) ? mergeLayers(current, value) : value;
  }
  return merged;
}

function toInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Configuration values read from environment variables
 */
export function environmentLayer(env: Environment): ConfigLayer {
  const neo4j: ConfigLayer = {
    uri: env.NEO4J_URI,
    user: env.NEO4J_USER,
    password: env.NEO4J_PASSWORD,
    database: env.NEO4J_DATABASE,
  };
  return {
    store: {
      backend: env.MIGRATION_GRAPH_STORE,
      neo4j,
    },
    inference: {
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      model: env.OPENAI_MODEL,
      timeoutMs: toInt(env.OPENAI_TIMEOUT_MS, "OPENAI_TIMEOUT_MS"),
      maxAttempts: toInt(env.OPENAI_MAX_ATTEMPTS, "OPENAI_MAX_ATTEMPTS"),
    },
    extraction: {
      concurrency: toInt(env.MIGRATION_CONCURRENCY, "MIGRATION_CONCURRENCY"),
      maxFileSize: toInt(env.MAX_FILE_SIZE_ANALYSIS, "MAX_FILE_SIZE_ANALYSIS"),
    },
  };
}

export interface LoadConfigOptions {
  projectRoot?: string;
  env?: Environment;
  overrides?: ConfigLayer;
}

/**
 * Loads and validates the pipeline configuration.
 *
 * @throws ConfigurationError when the file is unreadable or a value fails validation
 */
export function loadConfig(options: LoadConfigOptions = {}): PipelineConfig {
  const { projectRoot, env = process.env, overrides = {} } = options;
  const configPath = getConfigPath(projectRoot);

  let fileLayer: ConfigLayer = {};
  try {
    const raw = readJson(configPath);
    if (raw !== null) {
      if (!isLayer(raw)) {
        throw new ConfigurationError(`${configPath} must contain a JSON object`);
      }
      fileLayer = raw;
    }
  } catch (error) {
    if (error instanceof ConfigurationError) throw error;
    throw new ConfigurationError(`Cannot read ${configPath}`, ErrorCode.CONFIG_INVALID, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const layered = mergeLayers(mergeLayers(fileLayer, environmentLayer(env)), overrides);
  try {
    return PipelineConfigSchema.parse(layered);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigurationError(`Invalid configuration: ${formatZodErrors(error).join("; ")}`, ErrorCode.CONFIG_INVALID);
    }
    throw error;
  }
}
