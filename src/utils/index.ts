/**
 * Shared utilities
 */

import * as fs from "node:fs";
import * as path from "node:path";

export * from "./logger.js";
export * from "./fs.js";
export * from "./async.js";

// =============================================================================
// Configuration Paths
// =============================================================================

export const CONFIG_DIR = ".migration-graph";
export const CONFIG_FILE = "config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigDir(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_DIR);
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), CONFIG_FILE);
}

export function getExportDir(projectRoot: string = getProjectRoot()): string {
  return path.join(getConfigDir(projectRoot), "exports");
}

// =============================================================================
// JSON Files
// =============================================================================

/**
 * Reads and parses a JSON file. Returns null when the file does not exist;
 * malformed JSON is an error.
 */
export function readJson(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return null;
  const content = fs.readFileSync(filePath, "utf-8");
  return JSON.parse(content);
}

export function writeJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
}
