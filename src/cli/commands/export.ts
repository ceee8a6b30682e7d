/**
 * export command - dump a project's graph as JSON or CSV
 */

import * as path from "node:path";
import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/logger.js";
import { getExportDir } from "../../utils/index.js";
import { ConfigurationError } from "../../core/errors.js";
import { isNodeLabel, isRelationshipType, type NodeLabel, type RelationshipType } from "../../core/graph/index.js";
import { exportSnapshot, writeSnapshot, type ExportFormat } from "../../core/export/index.js";
import { openContext } from "../context.js";

const logger = createLogger("export");

export interface ExportOptions {
  format?: string;
  output?: string;
  labels?: string;
  types?: string;
  includeStale?: boolean;
}

function splitList(value: string | undefined): string[] | undefined {
  return value
    ?.split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseLabels(value: string | undefined): NodeLabel[] | undefined {
  const items = splitList(value);
  if (!items) return undefined;
  const unknown = items.filter((item) => !isNodeLabel(item));
  if (unknown.length > 0) throw new ConfigurationError(`Unknown node label(s): ${unknown.join(", ")}`);
  return items.filter(isNodeLabel);
}

export function parseTypes(value: string | undefined): RelationshipType[] | undefined {
  const items = splitList(value);
  if (!items) return undefined;
  const unknown = items.filter((item) => !isRelationshipType(item));
  if (unknown.length > 0) throw new ConfigurationError(`Unknown relationship type(s): ${unknown.join(", ")}`);
  return items.filter(isRelationshipType);
}

export function parseFormat(value: string | undefined): ExportFormat {
  const format = value ?? "json";
  if (format !== "json" && format !== "csv") {
    throw new ConfigurationError(`Unsupported export format "${format}" (json or csv)`);
  }
  return format;
}

export async function exportCommand(projectId: string, options: ExportOptions): Promise<void> {
  const format = parseFormat(options.format);
  const filter = {
    labels: parseLabels(options.labels),
    types: parseTypes(options.types),
    includeStale: options.includeStale === true,
  };

  const context = await openContext();
  const spinner = ora(`Exporting ${projectId}...`).start();
  try {
    await context.orchestrator.getState(projectId);
    const snapshot = await exportSnapshot(context.store, projectId, filter);
    const target = path.resolve(
      options.output ?? path.join(getExportDir(), format === "json" ? `${projectId}.json` : projectId)
    );
    const written = await writeSnapshot(snapshot, target, format);
    spinner.succeed(chalk.green(`Exported ${snapshot.nodes.length} nodes and ${snapshot.edges.length} edges`));
    for (const file of written) console.log(chalk.dim(`  ${file}`));
  } catch (error) {
    spinner.fail(chalk.red("Export failed"));
    logger.error({ err: error, projectId }, "export failed");
    throw error;
  } finally {
    await context.close();
  }
}
