/**
 * Shared test fixtures: source trees on disk, project records and a
 * scripted inference service.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type {
  ClassifyRequest,
  ClassifyResponse,
  IInferenceService,
  InferFieldsRequest,
  InferFieldsResponse,
  InferSkeletonRequest,
  InferSkeletonResponse,
  MapTypeRequest,
  MapTypeResponse,
} from "../core/interfaces/IInferenceService.js";
import type { IGraphStore } from "../core/interfaces/IGraphStore.js";
import { fileRef, keys, nodeRef, projectRef } from "../core/graph/graph-access.js";
import { FILE_CHILD_RELATIONSHIPS } from "../core/graph/schema.js";
import { buildFileEntities } from "../core/extraction/entity-builder.js";
import { TransientInferenceError } from "../core/errors.js";
import type { ComponentType, ProjectEntity, PropertyBag } from "../types/entities.js";
import { emptySkeleton, type Skeleton, type SkeletonClass, type SkeletonFunction } from "../types/skeleton.js";

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Writes `files` (project-relative path -> content) under `root`.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = path.join(root, ...relativePath.split("/"));
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}

export function makeProject(id: string, sourceDir: string, overrides: Partial<ProjectEntity> = {}): ProjectEntity {
  return {
    id,
    name: id,
    source_dir: sourceDir,
    output_dir: null,
    status: "uploaded",
    last_committed: "uploaded",
    feedback_after: null,
    progress: 0,
    current_step: "Waiting for structure analysis",
    source_language: "python",
    target_language: "typescript",
    target_framework: null,
    description: null,
    custom_mappings: {},
    failure_reason: null,
    created_at: "2024-01-01T00:00:00.000Z",
    updated_at: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

export async function saveProject(store: IGraphStore, project: ProjectEntity): Promise<void> {
  await store.upsertNode(projectRef(project.id), { ...project });
}

type Handler<Req, Res> = (request: Req) => Res | Promise<Res>;

function unavailable(operation: string): never {
  throw new TransientInferenceError(`${operation} not scripted`, undefined, { model: "fake-model" });
}

/**
 * IInferenceService whose answers come from per-operation handlers.
 * Unscripted operations fail the way an unreachable model does. Every
 * request is recorded.
 */
export class FakeInference implements IInferenceService {
  readonly model = "fake-model";
  readonly calls: { operation: string; request: unknown }[] = [];

  constructor(
    private readonly handlers: {
      inferFields?: Handler<InferFieldsRequest, InferFieldsResponse>;
      inferSkeleton?: Handler<InferSkeletonRequest, InferSkeletonResponse>;
      classify?: Handler<ClassifyRequest, ClassifyResponse>;
      mapType?: Handler<MapTypeRequest, MapTypeResponse>;
    } = {}
  ) {}

  async inferFields(request: InferFieldsRequest): Promise<InferFieldsResponse> {
    this.calls.push({ operation: "inferFields", request });
    const handler = this.handlers.inferFields;
    return handler ? handler(request) : unavailable("inferFields");
  }

  async inferSkeleton(request: InferSkeletonRequest): Promise<InferSkeletonResponse> {
    this.calls.push({ operation: "inferSkeleton", request });
    const handler = this.handlers.inferSkeleton;
    return handler ? handler(request) : unavailable("inferSkeleton");
  }

  async classify(request: ClassifyRequest): Promise<ClassifyResponse> {
    this.calls.push({ operation: "classify", request });
    const handler = this.handlers.classify;
    return handler ? handler(request) : unavailable("classify");
  }

  async mapType(request: MapTypeRequest): Promise<MapTypeResponse> {
    this.calls.push({ operation: "mapType", request });
    const handler = this.handlers.mapType;
    return handler ? handler(request) : unavailable("mapType");
  }

  callsTo(operation: string): unknown[] {
    return this.calls.filter((call) => call.operation === operation).map((call) => call.request);
  }
}

/**
 * File node properties as the structure and content passes leave them.
 */
export function fileProperties(filePath: string, discoveryIndex: number, extra: PropertyBag = {}): PropertyBag {
  return {
    path: filePath,
    language: filePath.endsWith(".py") ? "python" : "unknown",
    size: 0,
    hash: `hash-${filePath}`,
    discovery_index: discoveryIndex,
    is_binary: false,
    stale: false,
    parse_status: "parsed",
    pending_imports: [],
    pending_references: [],
    ...extra,
  };
}

/**
 * Saves the project with one File per path (discovery order as given) and
 * an IMPORTS edge per `[from, to]` pair.
 */
export async function seedFiles(
  store: IGraphStore,
  project: ProjectEntity,
  paths: string[],
  imports: Array<[string, string]> = []
): Promise<void> {
  await store.transaction(async (tx) => {
    await tx.upsertNode(projectRef(project.id), { ...project });
    for (const [index, filePath] of paths.entries()) {
      await tx.upsertNode(fileRef(project.id, filePath), fileProperties(filePath, index));
      await tx.upsertEdge("CONTAINS", projectRef(project.id), fileRef(project.id, filePath));
    }
    for (const [from, to] of imports) {
      await tx.upsertEdge("IMPORTS", fileRef(project.id, from), fileRef(project.id, to), { module: to });
    }
  });
}

/**
 * Skeleton with every list empty, overridden by `parts`.
 */
export function skeletonOf(parts: Partial<Skeleton> = {}): Skeleton {
  return { ...emptySkeleton("python"), ...parts };
}

export function skeletonClass(name: string, parts: Partial<SkeletonClass> = {}): SkeletonClass {
  return {
    name,
    superclasses: [],
    keywords: {},
    decorators: [],
    methods: [],
    attributes: [],
    docstring: null,
    kind: null,
    kindEvidence: [],
    isFinal: false,
    lineStart: 1,
    lineEnd: 2,
    ...parts,
  };
}

export function skeletonFunction(name: string, parts: Partial<SkeletonFunction> = {}): SkeletonFunction {
  return {
    name,
    returnType: null,
    arguments: [],
    decorators: [],
    isStatic: false,
    isAsync: false,
    docstring: null,
    lineStart: 1,
    lineEnd: 2,
    ...parts,
  };
}

/**
 * Writes a file's entities the way the content pass does, from a
 * parsed skeleton. The File node must exist.
 */
export async function seedSkeleton(
  store: IGraphStore,
  projectId: string,
  filePath: string,
  skeleton: Skeleton
): Promise<void> {
  const { nodes } = buildFileEntities(filePath, skeleton, "syntax");
  await store.transaction(async (tx) => {
    for (const node of nodes) {
      const ref = nodeRef(projectId, node.label, node.key);
      await tx.upsertNode(ref, node.properties);
      await tx.upsertEdge(FILE_CHILD_RELATIONSHIPS[node.label], fileRef(projectId, filePath), ref);
    }
  });
}

export async function seedComponent(
  store: IGraphStore,
  projectId: string,
  filePath: string,
  type: ComponentType
): Promise<void> {
  const id = keys.component(filePath);
  const ref = nodeRef(projectId, "Component", id);
  await store.upsertNode(ref, { id, file_path: filePath, type, signals: [], provenance: "syntax" });
  await store.upsertEdge("CLASSIFIES_AS", fileRef(projectId, filePath), ref);
}
