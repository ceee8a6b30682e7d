/**
 * Pipeline Orchestrator
 *
 * Drives each project through the stage sequence, one stage per
 * `advance`. A stage's status is committed on the Project node only after
 * the stage's own writes landed, so the stored status is always the last
 * stage that completed. Retryable store failures are retried with backoff;
 * anything else moves the project to `failed` with a StageFailure report.
 *
 * @module
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { ISyntaxParser } from "../interfaces/ISyntaxParser.js";
import type { IInferenceService } from "../interfaces/IInferenceService.js";
import { fileRef, getProject, isLive, keys, projectRef, readLiveNodes } from "../graph/graph-access.js";
import { NODE_LABELS, RELATIONSHIP_TYPES, type NodeLabel, type RelationshipType } from "../graph/schema.js";
import { listFeedback, listReports, writeFeedback, writeReport } from "../audit/audit-trail.js";
import { ExtractionEngine } from "../extraction/extraction-engine.js";
import { DependencyResolver } from "../analysis/dependency-resolver.js";
import { ComponentClassifier } from "../analysis/classifier.js";
import { MappingGenerator } from "../planning/mapping-generator.js";
import { StrategyScheduler } from "../planning/strategy-scheduler.js";
import {
  ErrorCode,
  InvalidTransitionError,
  PipelineError,
  isRetryableError,
  wrapError,
  type MigrationError,
} from "../errors.js";
import {
  MappingSchema,
  type FeedbackEntity,
  type ProjectEntity,
  type ProjectStatus,
  type PropertyBag,
  type ReportEntity,
} from "../../types/entities.js";
import type { PipelineConfig } from "../../utils/validation.js";
import { CancellationTokenSource, Mutex, retry } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import { STAGE_PROGRESS, FEEDBACK_SOURCES, canTransition, isTerminal, nextStatus, type StageStatus } from "./states.js";

const logger = createLogger("orchestrator");

export const STAGE_FAILURE_REPORT = "StageFailure";
export const USER_FEEDBACK = "UserFeedback";

// =============================================================================
// Types
// =============================================================================

export const RegisterProjectInputSchema = z.object({
  projectId: z.string().min(1).optional(),
  name: z.string().min(1),
  sourceDir: z.string().min(1),
  outputDir: z.string().nullable().default(null),
  sourceLanguage: z.string().nullable().default(null),
  targetLanguage: z.string().min(1).optional(),
  targetFramework: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
  customMappings: z.record(z.string()).default({}),
});

export type RegisterProjectInput = z.input<typeof RegisterProjectInputSchema>;

export interface ProjectState {
  projectId: string;
  name: string;
  status: ProjectStatus;
  lastCommitted: ProjectStatus;
  feedbackAfter: ProjectStatus | null;
  progress: number;
  currentStep: string;
  failureReason: string | null;
  updatedAt: string;
}

export interface RunResult {
  state: ProjectState;
  /** Stages completed during this run */
  stages: ProjectStatus[];
  cancelled: boolean;
}

export interface RunOptions {
  /** Keep going through needs_feedback instead of pausing there. Default: false */
  continueOnFeedback?: boolean;
  /** Called after every committed stage */
  onStage?: (state: ProjectState) => void;
}

export interface FeedbackSubmission {
  issue: string;
  suggestion?: string | null;
  component?: string | null;
}

export interface GraphSummary {
  nodes: Partial<Record<NodeLabel, number>>;
  edges: Partial<Record<RelationshipType, number>>;
  totalNodes: number;
  totalEdges: number;
  /** Nodes marked stale by a later run; left out of every other count */
  staleNodes: number;
}

export interface ClosureEntry {
  path: string;
  hops: number;
}

export interface OrchestratorDependencies {
  store: IGraphStore;
  parser: ISyntaxParser;
  inference: IInferenceService | null;
  config: PipelineConfig;
  /** Clock for timestamps, injectable for tests */
  now?: () => Date;
}

interface StageOutcome {
  /** Constructs still unmapped after this stage */
  unresolved: number;
  summary: PropertyBag;
}

function toState(project: ProjectEntity): ProjectState {
  return {
    projectId: project.id,
    name: project.name,
    status: project.status,
    lastCommitted: project.last_committed,
    feedbackAfter: project.feedback_after,
    progress: project.progress,
    currentStep: project.current_step,
    failureReason: project.failure_reason,
    updatedAt: project.updated_at,
  };
}

// =============================================================================
// Orchestrator
// =============================================================================

/**
 * @example
 * ```typescript
 * const orchestrator = new PipelineOrchestrator({ store, parser, inference: null, config });
 * const project = await orchestrator.registerProject({ name: "billing", sourceDir: "./legacy" });
 * const { state } = await orchestrator.run(project.id);
 * console.log(state.status, state.progress);
 * ```
 */
export class PipelineOrchestrator {
  private readonly store: IGraphStore;
  private readonly config: PipelineConfig;
  private readonly now: () => Date;
  private readonly extraction: ExtractionEngine;
  private readonly resolver: DependencyResolver;
  private readonly classifier: ComponentClassifier;
  private readonly mapper: MappingGenerator;
  private readonly scheduler: StrategyScheduler;
  private readonly locks = new Map<string, Mutex>();
  private readonly cancellations = new Map<string, CancellationTokenSource>();

  constructor(deps: OrchestratorDependencies) {
    this.store = deps.store;
    this.config = deps.config;
    this.now = deps.now ?? (() => new Date());
    this.extraction = new ExtractionEngine({
      store: deps.store,
      parser: deps.parser,
      inference: deps.inference,
      config: deps.config.extraction,
      maxInferenceChars: deps.config.inference.maxInputChars,
    });
    this.resolver = new DependencyResolver(deps.store, deps.config.analysis.closureDepth);
    this.classifier = new ComponentClassifier(deps.store, deps.inference, deps.config.extraction.concurrency);
    this.mapper = new MappingGenerator(deps.store, deps.inference);
    this.scheduler = new StrategyScheduler(deps.store, deps.config.analysis.closureDepth);
  }

  // ===========================================================================
  // Intake & Queries
  // ===========================================================================

  /**
   * Creates the Project node in `uploaded`. Registering an existing id
   * replaces its intake fields and restarts it from `uploaded`; the graph
   * built so far is kept and updated in place by the next run.
   */
  async registerProject(input: RegisterProjectInput): Promise<ProjectEntity> {
    const parsed = RegisterProjectInputSchema.parse(input);
    const id = parsed.projectId ?? randomUUID();

    return this.lockFor(id).runExclusive(async () => {
      const existing = await getProject(this.store, id);
      const timestamp = this.now().toISOString();
      const project: ProjectEntity = {
        id,
        name: parsed.name,
        source_dir: parsed.sourceDir,
        output_dir: parsed.outputDir,
        status: "uploaded",
        last_committed: "uploaded",
        feedback_after: null,
        progress: STAGE_PROGRESS.uploaded.progress,
        current_step: STAGE_PROGRESS.uploaded.currentStep,
        source_language: parsed.sourceLanguage,
        target_language: parsed.targetLanguage ?? this.config.defaultTargetLanguage,
        target_framework: parsed.targetFramework,
        description: parsed.description,
        custom_mappings: parsed.customMappings,
        failure_reason: null,
        created_at: existing?.created_at ?? timestamp,
        updated_at: timestamp,
      };

      await this.store.transaction(async (tx) => {
        await tx.upsertNode(projectRef(id), project);
      });
      logger.info({ projectId: id, sourceDir: project.source_dir, reregistered: existing !== null }, "project registered");
      return project;
    });
  }

  async getState(projectId: string): Promise<ProjectState> {
    return toState(await this.requireProject(projectId));
  }

  async listProjects(): Promise<ProjectState[]> {
    const ids = await this.store.listProjectIds();
    const projects = await Promise.all(ids.map((id) => this.requireProject(id)));
    return projects
      .sort((a, b) => a.created_at.localeCompare(b.created_at) || a.id.localeCompare(b.id))
      .map(toState);
  }

  // ===========================================================================
  // Stage Execution
  // ===========================================================================

  /**
   * Runs exactly one stage. Calls for the same project queue behind each
   * other.
   *
   * @throws InvalidTransitionError when the project is done or failed
   */
  async advance(projectId: string): Promise<ProjectState> {
    return this.lockFor(projectId).runExclusive(() => this.advanceLocked(projectId));
  }

  /**
   * Advances until the project is done or failed, pauses at
   * needs_feedback unless told otherwise, and stops early when cancelled.
   * Cancellation is checked between stages only.
   */
  async run(projectId: string, options: RunOptions = {}): Promise<RunResult> {
    const source = new CancellationTokenSource();
    this.cancellations.set(projectId, source);
    const stages: ProjectStatus[] = [];

    try {
      let state = await this.getState(projectId);
      while (!isTerminal(state.status)) {
        if (source.token.cancelled) {
          logger.info({ projectId, status: state.status, reason: source.token.reason }, "run cancelled");
          return { state, stages, cancelled: true };
        }
        if (state.status === "needs_feedback" && stages.length > 0 && !options.continueOnFeedback) {
          break;
        }

        state = await this.advance(projectId);
        if (state.status !== "failed") stages.push(state.lastCommitted);
        options.onStage?.(state);
      }
      return { state, stages, cancelled: false };
    } finally {
      if (this.cancellations.get(projectId) === source) {
        this.cancellations.delete(projectId);
      }
    }
  }

  /**
   * Stops an active `run` at its next stage boundary. The stage in flight
   * still commits.
   *
   * @returns whether a run was active
   */
  cancel(projectId: string, reason: string = "cancelled by caller"): boolean {
    const source = this.cancellations.get(projectId);
    if (!source) return false;
    source.cancel(reason);
    return true;
  }

  private async advanceLocked(projectId: string): Promise<ProjectState> {
    const project = await this.requireProject(projectId);
    const target = nextStatus(project.status, project.feedback_after);
    if (target === null) {
      throw new InvalidTransitionError(projectId, project.status);
    }

    const from = project.status === "needs_feedback" ? project.last_committed : project.status;
    if (!canTransition(from, target)) {
      throw new InvalidTransitionError(projectId, from);
    }
    const startedAt = Date.now();
    let attempts = 0;

    try {
      const outcome = await retry(
        async () => {
          attempts++;
          return this.runStage(project, target);
        },
        {
          ...this.config.retry,
          retryIf: isRetryableError,
          onRetry: (error, attempt, delayMs) => {
            logger.warn(
              { projectId, stage: target, attempt, delayMs, error: wrapError(error).toString() },
              "stage failed, retrying"
            );
          },
        }
      );

      const diverted = outcome.unresolved > 0 && FEEDBACK_SOURCES.has(target);
      const status: ProjectStatus = diverted ? "needs_feedback" : target;

      const committed = await retry(() => this.commitStatus(project, status, target, diverted ? target : null), {
        ...this.config.retry,
        retryIf: isRetryableError,
      });
      logger.info(
        { projectId, stage: target, status, attempts, durationMs: Date.now() - startedAt, ...outcome.summary },
        "stage committed"
      );
      return toState(committed);
    } catch (error) {
      if (error instanceof InvalidTransitionError) throw error;
      const failure = wrapError(error, `Stage ${target} failed`);
      return toState(await this.markFailed(project, target, failure, attempts));
    }
  }

  private async runStage(project: ProjectEntity, target: StageStatus): Promise<StageOutcome> {
    switch (target) {
      case "uploaded":
        return { unresolved: 0, summary: {} };
      case "structure_analyzed": {
        const result = await this.extraction.runStructurePass(project);
        return { unresolved: 0, summary: { ...result } };
      }
      case "content_analyzed": {
        const { resolution, ...counts } = await this.extraction.runContentPass(project);
        return { unresolved: 0, summary: { ...counts, ...resolution } };
      }
      case "classified": {
        const analysis = await this.resolver.resolve(project.id);
        const result = await this.classifier.classifyProject(project.id);
        return {
          unresolved: 0,
          summary: { cycles: analysis.cycles.length, components: result.components.length, fallbacks: result.fallbacks },
        };
      }
      case "mapped": {
        const result = await this.mapper.generate(project);
        return { unresolved: result.unresolved, summary: { mappings: result.mappings.length, unresolved: result.unresolved } };
      }
      case "strategized": {
        const result = await this.scheduler.schedule(project.id);
        const unresolved = await this.countUnresolved(project.id);
        return { unresolved, summary: { strategies: result.strategies.length, cycles: result.cycles.length } };
      }
      case "done":
        return { unresolved: 0, summary: {} };
    }
  }

  private async commitStatus(
    project: ProjectEntity,
    status: ProjectStatus,
    lastCommitted: StageStatus,
    feedbackAfter: StageStatus | null
  ): Promise<ProjectEntity> {
    const stage = STAGE_PROGRESS[lastCommitted];
    const updated: ProjectEntity = {
      ...project,
      status,
      last_committed: lastCommitted,
      feedback_after: feedbackAfter,
      progress: stage.progress,
      current_step: status === "needs_feedback" ? STAGE_PROGRESS.needs_feedback.currentStep : stage.currentStep,
      failure_reason: null,
      updated_at: this.now().toISOString(),
    };
    await this.store.transaction(async (tx) => {
      await tx.upsertNode(projectRef(project.id), updated);
    });
    return updated;
  }

  private async markFailed(
    project: ProjectEntity,
    stage: StageStatus,
    error: MigrationError,
    attempts: number
  ): Promise<ProjectEntity> {
    const timestamp = this.now();
    const failed: ProjectEntity = {
      ...project,
      status: "failed",
      current_step: `${STAGE_PROGRESS.failed.currentStep}: ${stage}`,
      failure_reason: error.toString(),
      updated_at: timestamp.toISOString(),
    };

    await this.store.transaction(async (tx) => {
      await tx.upsertNode(projectRef(project.id), failed);
      await writeReport(
        tx,
        project.id,
        {
          kind: STAGE_FAILURE_REPORT,
          subject: stage,
          message: error.message,
          details: {
            error: error.name,
            code: error.code,
            stage,
            attempts,
            retryable: error.retryable,
            last_committed: project.last_committed,
          },
        },
        timestamp
      );
    });

    logger.error({ projectId: project.id, stage, attempts, error: error.toString() }, "stage failed");
    return failed;
  }

  // ===========================================================================
  // Feedback, Reports & Metadata
  // ===========================================================================

  async recordFeedback(projectId: string, submission: FeedbackSubmission): Promise<FeedbackEntity> {
    await this.requireProject(projectId);
    const subject = `${submission.component ?? "project"}:${randomUUID()}`;
    await this.store.transaction(async (tx) => {
      await writeFeedback(
        tx,
        projectId,
        {
          kind: USER_FEEDBACK,
          subject,
          issue: submission.issue,
          suggestion: submission.suggestion ?? null,
          component: submission.component ?? null,
        },
        this.now()
      );
    });

    const recorded = (await listFeedback(this.store, projectId, USER_FEEDBACK)).find(
      (entry) => entry.id === keys.feedback(USER_FEEDBACK, subject)
    );
    if (!recorded) {
      throw new PipelineError(`Feedback for ${projectId} was not stored`, ErrorCode.UNKNOWN_ERROR, { projectId });
    }
    return recorded;
  }

  async listReports(projectId: string, kind?: string): Promise<ReportEntity[]> {
    await this.requireProject(projectId);
    return listReports(this.store, projectId, kind);
  }

  async listFeedback(projectId: string, kind?: string): Promise<FeedbackEntity[]> {
    await this.requireProject(projectId);
    return listFeedback(this.store, projectId, kind);
  }

  /**
   * Live node counts per label and edge counts per type; edges touching a
   * stale node are left out.
   */
  async getSummary(projectId: string): Promise<GraphSummary> {
    await this.requireProject(projectId);
    const [nodes, edges] = await Promise.all([
      this.store.query({ kind: "nodes", projectId }),
      this.store.query({ kind: "edges", projectId }),
    ]);

    const liveNodes = nodes.rows.filter(isLive);
    const stale = new Set(nodes.rows.filter((row) => !isLive(row)).map((row) => `${row.label}:${row.key}`));
    const liveEdges = edges.rows.filter(
      (row) => !stale.has(`${row.from.label}:${row.from.key}`) && !stale.has(`${row.to.label}:${row.to.key}`)
    );

    const summary: GraphSummary = {
      nodes: {},
      edges: {},
      totalNodes: liveNodes.length,
      totalEdges: liveEdges.length,
      staleNodes: stale.size,
    };
    for (const label of NODE_LABELS) {
      const count = liveNodes.filter((row) => row.label === label).length;
      if (count > 0) summary.nodes[label] = count;
    }
    for (const type of RELATIONSHIP_TYPES) {
      const count = liveEdges.filter((row) => row.type === type).length;
      if (count > 0) summary.edges[type] = count;
    }
    return summary;
  }

  /**
   * Files reachable from `filePath` over IMPORTS and REFERENCES, nearest
   * first. Without a depth the closure is unbounded.
   */
  async getFileClosure(projectId: string, filePath: string, depth?: number): Promise<ClosureEntry[]> {
    await this.requireProject(projectId);
    const { rows } = await this.store.query({
      kind: "traverse",
      start: fileRef(projectId, filePath),
      types: ["IMPORTS", "REFERENCES"],
      maxHops: depth,
    });
    return rows
      .filter((row) => row.node.label === "File" && row.node.properties.stale !== true)
      .map((row) => ({ path: row.node.key, hops: row.hops }))
      .sort((a, b) => a.hops - b.hops || a.path.localeCompare(b.path));
  }

  /**
   * Deletes the project's whole subgraph.
   *
   * @returns number of nodes removed
   */
  async purgeProject(projectId: string): Promise<number> {
    return this.lockFor(projectId).runExclusive(async () => {
      await this.requireProject(projectId);
      this.cancel(projectId, "project purged");
      const removed = await this.store.purgeProject(projectId);
      logger.info({ projectId, removed }, "project purged");
      return removed;
    });
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private lockFor(projectId: string): Mutex {
    let lock = this.locks.get(projectId);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(projectId, lock);
    }
    return lock;
  }

  private async requireProject(projectId: string): Promise<ProjectEntity> {
    const project = await getProject(this.store, projectId);
    if (!project) {
      throw new PipelineError(`Unknown project ${projectId}`, ErrorCode.PROJECT_NOT_FOUND, { projectId });
    }
    return project;
  }

  private async countUnresolved(projectId: string): Promise<number> {
    const mappings = await readLiveNodes(this.store, projectId, "Mapping", MappingSchema);
    return mappings.reduce((sum, node) => sum + node.entity.unresolved.length, 0);
  }
}
