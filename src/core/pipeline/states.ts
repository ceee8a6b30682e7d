/**
 * Pipeline States
 *
 * The project lifecycle as a transition table. `failed` is reachable from
 * every non-terminal state; `needs_feedback` only after mapping or
 * strategizing, and resumes with the stage after the one it was entered
 * from.
 *
 * @module
 */

import type { ProjectStatus } from "../../types/entities.js";

export const STAGE_SEQUENCE = [
  "uploaded",
  "structure_analyzed",
  "content_analyzed",
  "classified",
  "mapped",
  "strategized",
  "done",
] as const satisfies readonly ProjectStatus[];

export type StageStatus = (typeof STAGE_SEQUENCE)[number];

export const TERMINAL_STATES: ReadonlySet<ProjectStatus> = new Set<ProjectStatus>(["done", "failed"]);

/** States after which unresolved constructs divert to needs_feedback */
export const FEEDBACK_SOURCES: ReadonlySet<ProjectStatus> = new Set<ProjectStatus>(["mapped", "strategized"]);

export interface StageProgress {
  progress: number;
  currentStep: string;
}

export const STAGE_PROGRESS: Record<ProjectStatus, StageProgress> = {
  uploaded: { progress: 0, currentStep: "Waiting for structure analysis" },
  structure_analyzed: { progress: 20, currentStep: "Files discovered" },
  content_analyzed: { progress: 40, currentStep: "Entities extracted" },
  classified: { progress: 60, currentStep: "Components classified" },
  mapped: { progress: 75, currentStep: "Target mappings generated" },
  strategized: { progress: 90, currentStep: "Migration strategy planned" },
  done: { progress: 100, currentStep: "Complete" },
  needs_feedback: { progress: 0, currentStep: "Waiting for feedback on unresolved constructs" },
  failed: { progress: 0, currentStep: "Failed" },
};

export function isTerminal(status: ProjectStatus): boolean {
  return TERMINAL_STATES.has(status);
}

function isStageStatus(status: ProjectStatus): status is StageStatus {
  return STAGE_SEQUENCE.some((stage) => stage === status);
}

/**
 * Status the next `advance` produces on success, before any feedback
 * diversion. null for terminal states.
 */
export function nextStatus(status: ProjectStatus, feedbackAfter: ProjectStatus | null): StageStatus | null {
  if (isTerminal(status)) return null;
  const from = status === "needs_feedback" ? feedbackAfter : status;
  if (from === null || !isStageStatus(from)) return null;
  return STAGE_SEQUENCE[STAGE_SEQUENCE.indexOf(from) + 1] ?? null;
}

/**
 * Whether the state machine allows `from → to` in one step.
 */
export function canTransition(from: ProjectStatus, to: ProjectStatus, feedbackAfter: ProjectStatus | null = null): boolean {
  if (isTerminal(from)) return false;
  if (to === "failed") return true;
  if (to === "needs_feedback") return FEEDBACK_SOURCES.has(from);
  return nextStatus(from, feedbackAfter) === to;
}
