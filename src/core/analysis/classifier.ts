/**
 * Component Classifier
 *
 * Assigns every live file one coarse component type and records it as a
 * Component node with a functional CLASSIFIES_AS edge. Rules decide first;
 * inference settles what the rules leave ambiguous; a fallback covers the
 * rest. Components of files that are gone are marked stale.
 *
 * @module
 */

import type { IGraphStore } from "../interfaces/IGraphStore.js";
import type { IInferenceService } from "../interfaces/IInferenceService.js";
import { fileRef, keys, markStaleExcept, nodeRef } from "../graph/graph-access.js";
import { writeFeedback, type FeedbackInput } from "../audit/audit-trail.js";
import { TransientInferenceError } from "../errors.js";
import type { ComponentEntity, ComponentType, Provenance } from "../../types/entities.js";
import { mapConcurrent } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import { classifyByRules, fallbackType, CODE_LANGUAGES, type ClassificationInput } from "./classification-rules.js";
import { loadFileSummaries, type FileSummary } from "./file-summary.js";

const logger = createLogger("classifier");

export interface ClassificationResult {
  components: ComponentEntity[];
  /** Components of an earlier run marked stale by this one */
  retired: number;
  byType: Record<ComponentType, number>;
  inferred: number;
  fallbacks: number;
}

function toInput(summary: FileSummary): ClassificationInput {
  return {
    path: summary.file.path,
    language: summary.file.language,
    imports: summary.file.pending_imports.map((link) => link.module),
    functionCount: summary.functions.length,
    classes: summary.classes.map((cls) => ({
      type: cls.type,
      decorators: cls.decorators,
      superclasses: cls.superclasses,
    })),
    enumCount: summary.enums.length,
  };
}

export class ComponentClassifier {
  constructor(
    private readonly store: IGraphStore,
    private readonly inference: IInferenceService | null,
    private readonly concurrency: number = 4
  ) {}

  async classifyProject(projectId: string): Promise<ClassificationResult> {
    const summaries = await loadFileSummaries(this.store, projectId);
    const feedback: FeedbackInput[] = [];

    const components = await mapConcurrent(
      summaries,
      (summary) => this.classifyFile(summary, feedback),
      this.concurrency
    );

    const retired = await this.store.transaction(async (tx) => {
      for (const component of components) {
        const ref = nodeRef(projectId, "Component", component.id);
        await tx.upsertNode(ref, { ...component, stale: false });
        await tx.upsertEdge("CLASSIFIES_AS", fileRef(projectId, component.file_path), ref);
      }
      for (const entry of feedback) {
        await writeFeedback(tx, projectId, entry);
      }
      return markStaleExcept(tx, projectId, "Component", new Set(components.map((component) => component.id)));
    });

    const byType: Record<ComponentType, number> = { ui: 0, logic: 0, data: 0, config: 0, unknown: 0 };
    for (const component of components) byType[component.type]++;
    const result: ClassificationResult = {
      components,
      retired,
      byType,
      inferred: components.filter((component) => component.provenance === "inference").length,
      fallbacks: components.filter((component) => component.provenance === "default").length,
    };
    logger.info({ projectId, ...byType }, "files classified");
    return result;
  }

  private async classifyFile(summary: FileSummary, feedback: FeedbackInput[]): Promise<ComponentEntity> {
    const input = toInput(summary);
    const decision = classifyByRules(input);
    const build = (type: ComponentType, provenance: Provenance, signals: string[]): ComponentEntity => ({
      id: keys.component(input.path),
      file_path: input.path,
      type,
      signals,
      provenance,
    });

    if (decision.type) {
      return build(decision.type, "syntax", decision.signals);
    }

    if (this.inference && CODE_LANGUAGES.has(input.language)) {
      try {
        const answer = await this.inference.classify({
          filePath: input.path,
          language: input.language,
          signals: decision.signals,
          summary: {
            functions: summary.functions.map((fn) => fn.name),
            classes: summary.classes.map((cls) => cls.name),
            enums: summary.enums.map((declared) => declared.name),
            imports: input.imports,
          },
        });
        return build(answer.type, "inference", [...decision.signals, "inference"]);
      } catch (error) {
        if (!(error instanceof TransientInferenceError)) throw error;
        feedback.push({
          kind: "TransientInferenceError",
          subject: `classify:${input.path}`,
          issue: `Could not classify ${input.path}: ${error.message}`,
          component: input.path,
          details: { code: error.code, signals: decision.signals },
        });
      }
    }

    return build(fallbackType(input.language), "default", [...decision.signals, "fallback"]);
  }
}
