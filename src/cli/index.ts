#!/usr/bin/env node

/**
 * migration-graph CLI
 * Analyze legacy source trees and inspect or export their migration graphs
 */

import { Command } from "commander";
import chalk from "chalk";
import { analyzeCommand, exportCommand, statusCommand } from "./commands/index.js";
import { isMigrationError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("migration-graph")
  .description("Extract a metadata graph from a legacy codebase and plan its migration")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("analyze")
  .description("Register a source directory and run the pipeline on it")
  .argument("<dir>", "Source directory of the legacy project")
  .option("-t, --target-language <language>", "Language to migrate to")
  .option("--target-framework <framework>", "Framework to migrate to")
  .option("-p, --project-id <id>", "Reuse or choose the project id")
  .option("-n, --name <name>", "Project name (default: directory name)")
  .option("-e, --export <file>", "Write a snapshot of the graph when done")
  .option("-f, --format <format>", "Snapshot format: json or csv", "json")
  .option("--continue-on-feedback", "Keep going when constructs need feedback")
  .action(analyzeCommand);

program
  .command("status")
  .description("Show pipeline state for a project, or list projects")
  .argument("[projectId]", "Project to show")
  .option("-v, --verbose", "Show node, edge and report details")
  .action(statusCommand);

program
  .command("export")
  .description("Export a project's graph")
  .argument("<projectId>", "Project to export")
  .option("-f, --format <format>", "json or csv", "json")
  .option("-o, --output <path>", "Output file (json) or directory (csv)")
  .option("--labels <labels>", "Comma-separated node labels to include")
  .option("--types <types>", "Comma-separated relationship types to include")
  .option("--include-stale", "Keep nodes a later run marked stale")
  .action(exportCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${isMigrationError(error) ? error.toString() : error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("SIGTERM", () => {
  logger.info({ signal: "SIGTERM" }, "Received shutdown signal");
  process.exit(0);
});

program.parseAsync(process.argv).catch(handleError);
