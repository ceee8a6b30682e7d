import chalk from "chalk";
import type { FeedbackEntity } from "../../types/entities.js";
import type { ProjectState } from "../../core/pipeline/index.js";

const STATUS_COLORS: Record<string, (text: string) => string> = {
  done: chalk.green,
  failed: chalk.red,
  needs_feedback: chalk.yellow,
};

export function printState(state: ProjectState): void {
  const color = STATUS_COLORS[state.status] ?? chalk.cyan;
  console.log();
  console.log(chalk.white.bold(`Project ${state.name}`) + chalk.dim(` (${state.projectId})`));
  console.log(`  Status:          ${color(state.status)}`);
  console.log(`  Last committed:  ${state.lastCommitted}`);
  console.log(`  Progress:        ${state.progress}%`);
  console.log(`  Step:            ${state.currentStep}`);
  if (state.failureReason) {
    console.log(`  Failure:         ${chalk.red(state.failureReason)}`);
  }
}

export function printFeedback(entries: FeedbackEntity[], limit: number = 10): void {
  if (entries.length === 0) return;
  console.log();
  console.log(chalk.yellow.bold(`Feedback (${entries.length})`));
  for (const entry of entries.slice(0, limit)) {
    console.log(`  ${chalk.yellow("!")} ${entry.issue}${entry.component ? chalk.dim(` [${entry.component}]`) : ""}`);
  }
  if (entries.length > limit) {
    console.log(chalk.dim(`  ... and ${entries.length - limit} more`));
  }
}
