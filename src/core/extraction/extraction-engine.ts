/**
 * Extraction Engine
 *
 * Two passes over a project's files:
 *
 * 1. Structure: scan the source directory and upsert one File node per file
 *    (with CONTAINS from the Project).
 * 2. Content: parse each file, ask inference for what parsing leaves open,
 *    and write the file's entities, reports and pending links in one
 *    transaction. Once every file is written, pending links are resolved
 *    into IMPORTS, REFERENCES and DEPENDS_ON edges.
 *
 * A file that fails to parse is confined to itself: it keeps its File node,
 * gets a MalformedInputError report, and the other files carry on.
 *
 * @module
 */

import * as path from "node:path";
import type { IGraphStore, ITransaction, NodeRef } from "../interfaces/IGraphStore.js";
import type { ISyntaxParser } from "../interfaces/ISyntaxParser.js";
import type { IInferenceService } from "../interfaces/IInferenceService.js";
import { FILE_CHILD_RELATIONSHIPS, type RelationshipType } from "../graph/schema.js";
import { fileRef, nodeRef, projectRef, readNodes, type TypedNode } from "../graph/graph-access.js";
import { writeFeedback, writeReport, type FeedbackInput, type ReportInput } from "../audit/audit-trail.js";
import { SourceScanner } from "../indexer/scanner.js";
import { TransientInferenceError } from "../errors.js";
import {
  FileSchema,
  type FileEntity,
  type ParseStatus,
  type PendingLink,
  type ProjectEntity,
  type PropertyBag,
  type Provenance,
} from "../../types/entities.js";
import type { Skeleton } from "../../types/skeleton.js";
import type { ExtractionConfig } from "../../utils/validation.js";
import { mapConcurrent } from "../../utils/async.js";
import { readSourceFile } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import { buildFileEntities, fieldKeys, KNOWN_DECORATORS, skeletonFromInference, type BuiltNode } from "./entity-builder.js";
import { importLinks, isProjectModule, topLevelModuleNames } from "./import-resolver.js";
import { resolvePendingLinks, type ResolutionResult } from "./reference-resolver.js";

const logger = createLogger("extraction");

// =============================================================================
// Types
// =============================================================================

export interface ExtractionDependencies {
  store: IGraphStore;
  parser: ISyntaxParser;
  /** null runs extraction from syntax alone */
  inference: IInferenceService | null;
  config: ExtractionConfig;
  /** Characters of a file sent for whole-file inference */
  maxInferenceChars: number;
}

export interface StructurePassResult {
  files: number;
  added: number;
  changed: number;
  unchanged: number;
  removed: number;
}

export interface ContentPassOptions {
  /** Re-extract files whose content hash has not changed */
  force?: boolean;
}

export interface ContentPassResult {
  parsed: number;
  inferred: number;
  malformed: number;
  skipped: number;
  unchanged: number;
  inferenceFailures: number;
  resolution: ResolutionResult;
}

interface FileOutcome {
  status: ParseStatus;
  nodes: BuiltNode[];
  imports: PendingLink[];
  references: PendingLink[];
  reports: ReportInput[];
  feedback: FeedbackInput[];
  extra: PropertyBag;
}

interface ProjectContext {
  project: ProjectEntity;
  knownPaths: ReadonlySet<string>;
  topLevelNames: ReadonlySet<string>;
}

const CHILD_EDGE_TYPES: RelationshipType[] = Object.values(FILE_CHILD_RELATIONSHIPS);

function emptyOutcome(status: ParseStatus): FileOutcome {
  return { status, nodes: [], imports: [], references: [], reports: [], feedback: [], extra: {} };
}

function isLiveFile(file: TypedNode<FileEntity>): boolean {
  return file.properties.stale !== true;
}

// =============================================================================
// Engine
// =============================================================================

/**
 * @example
 * ```typescript
 * const engine = new ExtractionEngine({ store, parser, inference: null, config, maxInferenceChars: 25000 });
 * await engine.runStructurePass(project);
 * const result = await engine.runContentPass(project);
 * console.log(`${result.parsed} parsed, ${result.malformed} malformed`);
 * ```
 */
export class ExtractionEngine {
  private readonly store: IGraphStore;
  private readonly parser: ISyntaxParser;
  private readonly inference: IInferenceService | null;
  private readonly config: ExtractionConfig;
  private readonly maxInferenceChars: number;

  constructor(deps: ExtractionDependencies) {
    this.store = deps.store;
    this.parser = deps.parser;
    this.inference = deps.inference;
    this.config = deps.config;
    this.maxInferenceChars = deps.maxInferenceChars;
  }

  // ===========================================================================
  // Structure Pass
  // ===========================================================================

  async runStructurePass(project: ProjectEntity): Promise<StructurePassResult> {
    const scanner = new SourceScanner(project.source_dir);
    const scan = await scanner.scan({ ignore: this.config.ignorePatterns });
    const existing = new Map(
      (await readNodes(this.store, project.id, "File", FileSchema)).map((file) => [file.entity.path, file])
    );
    const result: StructurePassResult = { files: scan.files.length, added: 0, changed: 0, unchanged: 0, removed: 0 };
    const seen = new Set<string>();

    await this.store.transaction(async (tx) => {
      for (const file of scan.files) {
        seen.add(file.path);
        const previous = existing.get(file.path);
        const properties: PropertyBag = {
          path: file.path,
          language: file.language,
          size: file.size,
          hash: file.hash,
          discovery_index: file.discoveryIndex,
          is_binary: file.isBinary,
          stale: false,
        };

        if (!previous) {
          result.added++;
          Object.assign(properties, { parse_status: "pending", pending_imports: [], pending_references: [] });
        } else if (previous.entity.hash !== file.hash || !isLiveFile(previous)) {
          result.changed++;
          properties.parse_status = "pending";
        } else {
          result.unchanged++;
        }

        const ref = fileRef(project.id, file.path);
        await tx.upsertNode(ref, properties);
        await tx.upsertEdge("CONTAINS", projectRef(project.id), ref);
      }

      for (const [filePath, previous] of existing) {
        if (seen.has(filePath) || !isLiveFile(previous)) continue;
        result.removed++;
        await tx.upsertNode(previous.ref, { stale: true });
      }
    });

    logger.info({ projectId: project.id, ...result, scanTimeMs: scan.scanTimeMs }, "structure pass complete");
    return result;
  }

  // ===========================================================================
  // Content Pass
  // ===========================================================================

  async runContentPass(project: ProjectEntity, options: ContentPassOptions = {}): Promise<ContentPassResult> {
    await this.parser.initialize();

    const files = (await readNodes(this.store, project.id, "File", FileSchema)).filter(isLiveFile);
    const knownPaths = new Set(files.map((file) => file.entity.path));
    const context: ProjectContext = { project, knownPaths, topLevelNames: topLevelModuleNames(knownPaths) };
    const pending = options.force ? files : files.filter((file) => file.entity.parse_status === "pending");

    const counts = { parsed: 0, inferred: 0, malformed: 0, skipped: 0, inferenceFailures: 0 };
    await mapConcurrent(
      pending,
      async (file) => {
        const outcome = await this.extractFile(context, file.entity);
        await this.writeOutcome(project.id, file.entity.path, outcome);
        counts.inferenceFailures += outcome.feedback.filter((entry) => entry.kind === "TransientInferenceError").length;
        switch (outcome.status) {
          case "parsed":
            counts.parsed++;
            break;
          case "inferred":
            counts.inferred++;
            break;
          case "malformed":
            counts.malformed++;
            break;
          default:
            counts.skipped++;
        }
      },
      this.config.concurrency
    );

    // barrier: every File node and pending link is now committed
    const resolution = await resolvePendingLinks(this.store, project);

    const result: ContentPassResult = { ...counts, unchanged: files.length - pending.length, resolution };
    logger.info({ projectId: project.id, ...counts, unchanged: result.unchanged }, "content pass complete");
    return result;
  }

  /**
   * Derives everything one file contributes. Pure apart from reading the
   * file and calling inference; nothing is written here.
   */
  private async extractFile(context: ProjectContext, file: FileEntity): Promise<FileOutcome> {
    if (file.size > this.config.maxFileSize) {
      const outcome = emptyOutcome("skipped");
      outcome.reports.push({
        kind: "SkippedFile",
        subject: file.path,
        message: `File exceeds the analysis size limit (${file.size} > ${this.config.maxFileSize} bytes)`,
        details: { size: file.size, limit: this.config.maxFileSize },
      });
      return outcome;
    }

    let content: Buffer;
    try {
      const read = await readSourceFile(path.join(context.project.source_dir, ...file.path.split("/")));
      if (read.isBinary) return emptyOutcome("skipped");
      content = read.content;
    } catch (error) {
      logger.warn({ filePath: file.path, err: error }, "file unreadable");
      const outcome = emptyOutcome("skipped");
      outcome.reports.push({
        kind: "UnreadableFile",
        subject: file.path,
        message: error instanceof Error ? error.message : String(error),
      });
      return outcome;
    }
    const text = content.toString("utf-8");

    if (this.parser.supports(file.language)) {
      return this.extractParsed(context, file, text);
    }
    if (this.inference && file.language !== "unknown") {
      return this.extractInferred(context, file, text, this.inference);
    }
    return emptyOutcome("skipped");
  }

  private async extractParsed(context: ProjectContext, file: FileEntity, text: string): Promise<FileOutcome> {
    const parsed = this.parser.parse(text, file.language, file.path);
    if (!parsed.ok) {
      const error = parsed.error;
      logger.warn({ filePath: file.path, line: error.line, column: error.column }, "malformed file");
      const outcome = emptyOutcome("malformed");
      outcome.reports.push({
        kind: "MalformedInputError",
        subject: file.path,
        message: error.message,
        details: { code: error.code, line: error.line ?? null, column: error.column ?? null },
      });
      return outcome;
    }

    const skeleton = parsed.value;
    const outcome = emptyOutcome("parsed");
    let answers: Record<string, string | null> = {};
    if (this.inference) {
      const fields = this.fieldsToInfer(context, file.path, skeleton);
      if (fields.length > 0) {
        try {
          answers = (
            await this.inference.inferFields({ filePath: file.path, language: file.language, skeleton, fields })
          ).fields;
        } catch (error) {
          if (!(error instanceof TransientInferenceError)) throw error;
          outcome.feedback.push(inferenceFeedback(file.path, "inferFields", error, { fields }));
        }
      }
    }

    return this.finish(outcome, context, file.path, skeleton, "syntax", answers);
  }

  private async extractInferred(
    context: ProjectContext,
    file: FileEntity,
    text: string,
    inference: IInferenceService
  ): Promise<FileOutcome> {
    try {
      const response = await inference.inferSkeleton({
        filePath: file.path,
        language: file.language,
        content: text.slice(0, this.maxInferenceChars),
      });
      const outcome = emptyOutcome("inferred");
      outcome.extra = { truncated: text.length > this.maxInferenceChars };
      return this.finish(outcome, context, file.path, skeletonFromInference(response, file.language), "inference", {});
    } catch (error) {
      if (!(error instanceof TransientInferenceError)) throw error;
      const outcome = emptyOutcome("skipped");
      outcome.feedback.push(inferenceFeedback(file.path, "inferSkeleton", error, {}));
      return outcome;
    }
  }

  private finish(
    outcome: FileOutcome,
    context: ProjectContext,
    filePath: string,
    skeleton: Skeleton,
    origin: Provenance,
    answers: Record<string, string | null>
  ): FileOutcome {
    const built = buildFileEntities(filePath, skeleton, origin, answers);
    outcome.nodes = built.nodes;

    for (const entry of skeleton.imports) {
      const links = importLinks(entry, filePath).map((link) => {
        const answer = answers[fieldKeys.importTarget(link.module)];
        if (typeof answer === "string" && context.knownPaths.has(answer) && !link.candidates.includes(answer)) {
          return { ...link, candidates: [answer, ...link.candidates] };
        }
        return link;
      });
      outcome.imports.push(...links);
      if (entry.referenced) outcome.references.push(...links);
    }

    if (built.conflicts.length > 0) {
      outcome.extra = { ...outcome.extra, conflict_count: built.conflicts.length };
    }
    return outcome;
  }

  /**
   * Fields parsing leaves open: every class kind (inference may disagree
   * with syntax and the disagreement is recorded), decorators without a
   * fixed meaning, and project imports no file matches.
   */
  private fieldsToInfer(context: ProjectContext, filePath: string, skeleton: Skeleton): string[] {
    const fields: string[] = skeleton.classes.map((cls) => fieldKeys.classKind(cls.name));

    const decorators = new Set([
      ...skeleton.functions.flatMap((fn) => fn.decorators),
      ...skeleton.classes.flatMap((cls) => [...cls.decorators, ...cls.methods.flatMap((method) => method.decorators)]),
    ]);
    for (const decorator of decorators) {
      if (!KNOWN_DECORATORS.has(decorator)) fields.push(fieldKeys.decorator(decorator));
    }

    for (const entry of skeleton.imports) {
      if (!isProjectModule(entry, context.topLevelNames)) continue;
      for (const link of importLinks(entry, filePath)) {
        if (!link.candidates.some((candidate) => context.knownPaths.has(candidate))) {
          fields.push(fieldKeys.importTarget(link.module));
        }
      }
    }

    return [...new Set(fields)];
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * One transaction per file. Children the file no longer declares are
   * marked stale rather than deleted.
   */
  private async writeOutcome(projectId: string, filePath: string, outcome: FileOutcome): Promise<void> {
    const file = fileRef(projectId, filePath);
    await this.store.transaction(async (tx) => {
      await tx.upsertNode(file, {
        ...outcome.extra,
        parse_status: outcome.status,
        pending_imports: outcome.imports,
        pending_references: outcome.references,
        extracted_at: new Date().toISOString(),
      });

      const written = new Set<string>();
      for (const node of outcome.nodes) {
        const ref = nodeRef(projectId, node.label, node.key);
        written.add(`${node.label}:${node.key}`);
        await tx.upsertNode(ref, node.properties);
        await tx.upsertEdge(FILE_CHILD_RELATIONSHIPS[node.label], file, ref);
      }
      await this.markStaleChildren(tx, file, written);

      for (const report of outcome.reports) {
        await writeReport(tx, projectId, report);
      }
      for (const entry of outcome.feedback) {
        await writeFeedback(tx, projectId, entry);
      }
    });
  }

  private async markStaleChildren(tx: ITransaction, file: NodeRef, written: ReadonlySet<string>): Promise<void> {
    const { rows } = await tx.query({ kind: "edges", projectId: file.projectId, from: file, types: CHILD_EDGE_TYPES });
    for (const edge of rows) {
      if (!written.has(`${edge.to.label}:${edge.to.key}`)) {
        await tx.upsertNode(edge.to, { stale: true });
      }
    }
  }
}

function inferenceFeedback(
  filePath: string,
  operation: string,
  error: TransientInferenceError,
  details: PropertyBag
): FeedbackInput {
  return {
    kind: "TransientInferenceError",
    subject: `${operation}:${filePath}`,
    issue: `Inference unavailable for ${filePath}: ${error.message}`,
    component: filePath,
    details: { ...details, code: error.code, model: error.model ?? null },
  };
}
