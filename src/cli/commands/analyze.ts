/**
 * analyze command - register a source tree and run the pipeline on it
 */

import * as path from "node:path";
import chalk from "chalk";
import ora from "ora";
import { createLogger } from "../../utils/logger.js";
import { exportSnapshot, writeSnapshot } from "../../core/export/index.js";
import { STAGE_PROGRESS } from "../../core/pipeline/index.js";
import { openContext } from "../context.js";
import { parseFormat } from "./export.js";
import { printFeedback, printState } from "./format.js";

const logger = createLogger("analyze");

export interface AnalyzeOptions {
  targetLanguage?: string;
  targetFramework?: string;
  projectId?: string;
  name?: string;
  export?: string;
  format?: string;
  continueOnFeedback?: boolean;
}

export async function analyzeCommand(dir: string, options: AnalyzeOptions): Promise<void> {
  const sourceDir = path.resolve(dir);
  const format = parseFormat(options.format);
  const context = await openContext();
  const { orchestrator, store } = context;

  if (context.config.store.backend === "memory") {
    console.log(chalk.dim("Using the in-memory store; results last for this run only."));
  }

  const spinner = ora("Registering project...").start();
  let projectId: string | undefined;
  const onSignal = (): void => {
    if (projectId && orchestrator.cancel(projectId, "interrupted")) {
      spinner.text = "Cancelling after the current stage...";
    }
  };
  process.once("SIGINT", onSignal);

  try {
    const project = await orchestrator.registerProject({
      projectId: options.projectId,
      name: options.name ?? path.basename(sourceDir),
      sourceDir,
      targetLanguage: options.targetLanguage,
      targetFramework: options.targetFramework ?? null,
    });
    projectId = project.id;
    spinner.text = STAGE_PROGRESS.uploaded.currentStep;

    const result = await orchestrator.run(project.id, {
      continueOnFeedback: options.continueOnFeedback,
      onStage: (state) => {
        spinner.text = `${state.currentStep} (${state.progress}%)`;
      },
    });

    const { state } = result;
    if (result.cancelled) {
      spinner.warn(chalk.yellow(`Cancelled at ${state.status}`));
    } else if (state.status === "failed") {
      spinner.fail(chalk.red(`Pipeline failed: ${state.failureReason ?? "unknown error"}`));
    } else if (state.status === "needs_feedback") {
      spinner.warn(chalk.yellow("Pipeline paused: unresolved constructs need feedback"));
    } else {
      spinner.succeed(chalk.green("Analysis complete"));
    }

    printState(state);
    const summary = await orchestrator.getSummary(project.id);
    console.log();
    console.log(chalk.white.bold("Graph"));
    for (const [label, count] of Object.entries(summary.nodes)) {
      console.log(`  ${label.padEnd(18)} ${count}`);
    }
    if (state.status === "needs_feedback") {
      printFeedback(await orchestrator.listFeedback(project.id));
    }

    if (options.export) {
      const snapshot = await exportSnapshot(store, project.id);
      const written = await writeSnapshot(snapshot, path.resolve(options.export), format);
      console.log();
      console.log(chalk.dim(`Exported to ${written.join(", ")}`));
    }

    logger.info({ projectId: project.id, status: state.status, stages: result.stages }, "analyze finished");
    if (state.status === "failed") process.exitCode = 1;
  } catch (error) {
    spinner.fail(chalk.red("Analysis failed"));
    logger.error({ err: error }, "analyze failed");
    throw error;
  } finally {
    process.removeListener("SIGINT", onSignal);
    await context.close();
  }
}
