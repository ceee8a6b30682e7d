/**
 * Entity Builder
 *
 * Normalizes a Skeleton (from the parser or from inference) plus any field
 * answers from inference into Entity Model records for one file.
 *
 * @module
 */

import type { InferSkeletonResponse } from "../interfaces/IInferenceService.js";
import { keys } from "../graph/graph-access.js";
import type { FileChildLabel } from "../graph/schema.js";
import type {
  AttributeEntry,
  ClassEntity,
  EnumEntity,
  ExtensionEntity,
  FieldConflict,
  FunctionEntity,
  MethodEntry,
  PropertyBag,
  Provenance,
} from "../../types/entities.js";
import type { Skeleton, SkeletonClass, SkeletonFunction } from "../../types/skeleton.js";
import { ProvenanceTracker } from "./provenance.js";

// =============================================================================
// Types & Constants
// =============================================================================

export type ChildLabel = FileChildLabel;

export interface BuiltNode {
  label: ChildLabel;
  key: string;
  properties: PropertyBag;
}

export interface BuildResult {
  nodes: BuiltNode[];
  conflicts: FieldConflict[];
}

/** Type recorded for anything left unannotated */
export const UNKNOWN_TYPE = "Any";

/** Fallback class kind when neither syntax nor inference decides */
export const DEFAULT_CLASS_KIND = "plain";

/** Bases that mark a contract rather than a parent implementation */
const INTERFACE_MARKERS = new Set(["ABC", "Protocol"]);

/** Decorators with fixed, well-known meaning; never sent to inference */
export const KNOWN_DECORATORS: ReadonlySet<string> = new Set([
  "@staticmethod",
  "@classmethod",
  "@property",
  "@abstractmethod",
  "@abc.abstractmethod",
  "@final",
  "@typing.final",
  "@dataclass",
  "@dataclasses.dataclass",
  "@functools.wraps",
  "@functools.lru_cache",
  "@functools.cache",
  "@override",
]);

// =============================================================================
// Field Keys
// =============================================================================

export const fieldKeys = {
  classKind: (className: string) => `class:${className}:kind`,
  decorator: (decorator: string) => `decorator:${decorator}`,
  importTarget: (module: string) => `import:${module}`,
};

function lastSegment(name: string): string {
  const parts = name.split(".");
  return parts[parts.length - 1] ?? name;
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Builds the Function, Class, Enum and Extension records of one file.
 *
 * @param origin - "syntax" for a parsed skeleton, "inference" for one the
 * inference capability produced
 * @param answers - inferFields answers keyed by field key
 */
export function buildFileEntities(
  filePath: string,
  skeleton: Skeleton,
  origin: Provenance,
  answers: Record<string, string | null> = {}
): BuildResult {
  const nodes = new Map<string, BuiltNode>();
  const conflicts: FieldConflict[] = [];
  const put = (label: ChildLabel, key: string, properties: PropertyBag): void => {
    nodes.set(`${label}:${key}`, { label, key, properties });
  };

  for (const fn of skeleton.functions) {
    const entity = buildFunction(filePath, fn, origin, answers);
    put("Function", entity.id, entity);
  }

  for (const cls of skeleton.classes) {
    const entity = buildClass(filePath, cls, origin, answers);
    conflicts.push(...entity.conflicts);
    put("Class", entity.id, entity);
  }

  for (const declared of skeleton.enums) {
    const id = keys.enum(filePath, declared.name);
    const entity: EnumEntity = {
      id,
      name: declared.name,
      file_path: filePath,
      values: declared.values,
      docstring: declared.docstring,
      provenance: { values: origin, docstring: declared.docstring === null ? "default" : origin },
      stale: false,
    };
    put("Enum", id, { ...entity, line_start: declared.lineStart });
  }

  for (const extension of skeleton.extensions) {
    const id = keys.extension(filePath, extension.baseType);
    const entity: ExtensionEntity = {
      id,
      name: `${extension.baseType} extension`,
      file_path: filePath,
      base_type: extension.baseType,
      methods: extension.methods,
      provenance: { base_type: origin, methods: origin },
      stale: false,
    };
    put("Extension", id, { ...entity, line_start: extension.lineStart });
  }

  return { nodes: [...nodes.values()], conflicts };
}

function decoratorSemantics(decorators: string[], answers: Record<string, string | null>): PropertyBag {
  const semantics: PropertyBag = {};
  for (const decorator of decorators) {
    const meaning = answers[fieldKeys.decorator(decorator)];
    if (typeof meaning === "string") semantics[decorator] = meaning;
  }
  return semantics;
}

function buildFunction(
  filePath: string,
  fn: SkeletonFunction,
  origin: Provenance,
  answers: Record<string, string | null>
): FunctionEntity & { decorator_semantics: PropertyBag } {
  const tracker = new ProvenanceTracker(origin);
  const annotated = fn.arguments.every((arg) => arg.type !== null);
  const semantics = decoratorSemantics(fn.decorators, answers);

  const entity: FunctionEntity = {
    id: keys.function(filePath, fn.name),
    name: tracker.set("name", fn.name),
    file_path: filePath,
    return_type: tracker.merge("return_type", fn.returnType, undefined, UNKNOWN_TYPE),
    arguments: fn.arguments.map((arg) => ({ name: arg.name, type: arg.type ?? UNKNOWN_TYPE })),
    decorators: tracker.set("decorators", fn.decorators),
    // module-level functions have no receiver
    is_static: true,
    is_async: tracker.set("is_async", fn.isAsync),
    docstring: tracker.merge<string | null>("docstring", fn.docstring, undefined, null),
    line_start: fn.lineStart,
    line_end: fn.lineEnd,
    provenance: tracker.provenance,
    stale: false,
  };
  tracker.provenance.arguments = annotated ? origin : "default";
  if (Object.keys(semantics).length > 0) tracker.provenance.decorator_semantics = "inference";

  return { ...entity, decorator_semantics: semantics };
}

function buildMethod(method: SkeletonFunction): MethodEntry {
  return {
    name: method.name,
    return_type: method.returnType ?? UNKNOWN_TYPE,
    arguments: method.arguments.map((arg) => ({ name: arg.name, type: arg.type ?? UNKNOWN_TYPE })),
    decorators: method.decorators,
    is_static: method.isStatic,
    is_async: method.isAsync,
  };
}

function buildClass(
  filePath: string,
  cls: SkeletonClass,
  origin: Provenance,
  answers: Record<string, string | null>
): ClassEntity & { kind_evidence: string[]; decorator_semantics: PropertyBag } {
  const tracker = new ProvenanceTracker(origin);
  const interfaces = cls.superclasses.filter((base) => INTERFACE_MARKERS.has(lastSegment(base)));
  const superclasses = cls.superclasses.filter((base) => !INTERFACE_MARKERS.has(lastSegment(base)));
  const attributes: AttributeEntry[] = cls.attributes.map((attribute) => ({
    name: attribute.name,
    type: attribute.type ?? UNKNOWN_TYPE,
    visibility: attribute.visibility,
  }));
  const decorators = [...cls.decorators, ...cls.methods.flatMap((method) => method.decorators)];
  const semantics = decoratorSemantics([...new Set(decorators)], answers);

  const entity: ClassEntity = {
    id: keys.class(filePath, cls.name),
    name: tracker.set("name", cls.name),
    file_path: filePath,
    type: tracker.merge("type", cls.kind, answers[fieldKeys.classKind(cls.name)], DEFAULT_CLASS_KIND),
    is_static: false,
    is_final: tracker.set("is_final", cls.isFinal),
    superclasses: tracker.set("superclasses", superclasses),
    interfaces: tracker.set("interfaces", interfaces),
    methods: cls.methods.map(buildMethod),
    attributes,
    decorators: tracker.set("decorators", cls.decorators),
    docstring: tracker.merge<string | null>("docstring", cls.docstring, undefined, null),
    line_start: cls.lineStart,
    line_end: cls.lineEnd,
    provenance: tracker.provenance,
    conflicts: tracker.conflicts,
    stale: false,
  };
  tracker.provenance.methods = origin;
  tracker.provenance.attributes = origin;
  if (Object.keys(semantics).length > 0) tracker.provenance.decorator_semantics = "inference";

  return { ...entity, kind_evidence: cls.kindEvidence, decorator_semantics: semantics };
}

// =============================================================================
// Inferred Skeletons
// =============================================================================

/**
 * Normalizes a whole-file inference answer into a Skeleton. Line spans are
 * unknown and recorded as 0.
 */
export function skeletonFromInference(response: InferSkeletonResponse, language: string): Skeleton {
  const toFunction = (fn: InferSkeletonResponse["functions"][number]): SkeletonFunction => ({
    name: fn.name,
    returnType: fn.return_type,
    arguments: fn.arguments.map((arg) => ({ name: arg.name, type: arg.type })),
    decorators: fn.decorators,
    isStatic: fn.is_static,
    isAsync: fn.is_async,
    docstring: fn.docstring,
    lineStart: 0,
    lineEnd: 0,
  });

  return {
    language,
    functions: response.functions.map(toFunction),
    classes: response.classes.map((cls) => ({
      name: cls.name,
      superclasses: cls.superclasses,
      keywords: {},
      decorators: [],
      methods: cls.methods.map(toFunction),
      attributes: cls.attributes.map((attribute) => ({
        name: attribute.name,
        type: attribute.type,
        visibility: attribute.visibility,
      })),
      docstring: cls.docstring,
      kind: cls.type,
      kindEvidence: [],
      isFinal: false,
      lineStart: 0,
      lineEnd: 0,
    })),
    enums: response.enums.map((declared) => ({
      name: declared.name,
      values: declared.values,
      docstring: declared.docstring,
      lineStart: 0,
    })),
    extensions: [],
    imports: response.imports.map((module) => {
      const dots = /^\.*/.exec(module)?.[0].length ?? 0;
      return {
        module: module.slice(dots),
        names: [],
        level: dots,
        bindings: [],
        referenced: false,
        line: 0,
      };
    }),
  };
}
