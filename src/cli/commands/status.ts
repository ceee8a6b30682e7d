/**
 * status command - show a project's pipeline state
 */

import chalk from "chalk";
import { createLogger } from "../../utils/logger.js";
import { openContext } from "../context.js";
import { printFeedback, printState } from "./format.js";

const logger = createLogger("status");

export interface StatusOptions {
  verbose?: boolean;
}

export async function statusCommand(projectId: string | undefined, options: StatusOptions): Promise<void> {
  const context = await openContext();
  try {
    if (context.config.store.backend === "memory") {
      console.log(chalk.yellow("The in-memory store keeps nothing between runs; set store.backend to neo4j."));
    }

    const { orchestrator } = context;
    if (!projectId) {
      const projects = await orchestrator.listProjects();
      if (projects.length === 0) {
        console.log(chalk.dim("No projects registered."));
        return;
      }
      for (const state of projects) {
        console.log(`${state.projectId}  ${state.name.padEnd(24)} ${state.status} (${state.progress}%)`);
      }
      return;
    }

    const state = await orchestrator.getState(projectId);
    printState(state);

    if (options.verbose) {
      const summary = await orchestrator.getSummary(projectId);
      console.log();
      console.log(chalk.white.bold("Nodes"));
      for (const [label, count] of Object.entries(summary.nodes)) {
        console.log(`  ${label.padEnd(18)} ${count}`);
      }
      console.log(chalk.white.bold("Edges"));
      for (const [type, count] of Object.entries(summary.edges)) {
        console.log(`  ${type.padEnd(18)} ${count}`);
      }
      if (summary.staleNodes > 0) {
        console.log(chalk.dim(`  ${summary.staleNodes} stale node(s) not counted`));
      }
      const reports = await orchestrator.listReports(projectId);
      if (reports.length > 0) {
        console.log();
        console.log(chalk.white.bold(`Reports (${reports.length})`));
        for (const report of reports.slice(0, 10)) {
          console.log(`  ${chalk.dim(report.type)} ${report.message}`);
        }
      }
    }
    printFeedback(await orchestrator.listFeedback(projectId));
  } catch (error) {
    logger.error({ err: error, projectId }, "status failed");
    throw error;
  } finally {
    await context.close();
  }
}
