/**
 * Mapping Generator
 *
 * Derives a Mapping per Component (target component plus data-type
 * mapping) and a direct Mapping per legacy construct: singleton, abstract
 * and interface classes, and extensions. Types the tables cannot map go to
 * inference; whatever is still unmapped is listed on the Mapping and
 * routed to Feedback as an UnmappableConstructError. Mappings and target
 * components the current run no longer produces are marked stale.
 *
 * @module
 */

import type { IGraphStore, ITransaction, NodeRef } from "../interfaces/IGraphStore.js";
import type { IInferenceService } from "../interfaces/IInferenceService.js";
import { keys, markStaleExcept, nodeRef, readLiveNodes } from "../graph/graph-access.js";
import { writeFeedback } from "../audit/audit-trail.js";
import { loadFileSummaries, type FileSummary } from "../analysis/file-summary.js";
import { TransientInferenceError, UnmappableConstructError } from "../errors.js";
import {
  ComponentSchema,
  type ComponentEntity,
  type MappingEntity,
  type ProjectEntity,
  type Provenance,
} from "../../types/entities.js";
import { createLogger } from "../../utils/logger.js";
import {
  componentTarget,
  constructTarget,
  LEGACY_CLASS_KINDS,
  MANUAL_TARGET,
  mapDataType,
  type TargetRule,
} from "./mapping-rules.js";

const logger = createLogger("mapping-generator");

// =============================================================================
// Types
// =============================================================================

export interface MappingResult {
  mappings: MappingEntity[];
  /** Constructs and types left without a mapping, across all mappings */
  unresolved: number;
  customApplied: number;
  inferredTypes: number;
}

interface TypeResolution {
  target: string | null;
  provenance: Provenance;
  custom: boolean;
}

interface PlannedMapping {
  mapping: MappingEntity;
  source: NodeRef;
  target: TargetRule;
  problems: UnmappableConstructError[];
}

const DEFAULT_SOURCE_LANGUAGE = "python";

// =============================================================================
// Generator
// =============================================================================

export class MappingGenerator {
  constructor(
    private readonly store: IGraphStore,
    private readonly inference: IInferenceService | null
  ) {}

  async generate(project: ProjectEntity): Promise<MappingResult> {
    const [summaries, components] = await Promise.all([
      loadFileSummaries(this.store, project.id),
      readLiveNodes(this.store, project.id, "Component", ComponentSchema),
    ]);
    const componentByPath = new Map(components.map((node) => [node.entity.file_path, node.entity]));
    const knownTypes = new Set(
      summaries.flatMap((summary) => [
        ...summary.classes.map((cls) => cls.name),
        ...summary.enums.map((declared) => declared.name),
      ])
    );
    const resolver = new TypeResolver(project, knownTypes, this.inference);

    const planned: PlannedMapping[] = [];
    for (const summary of summaries) {
      const component = componentByPath.get(summary.file.path);
      if (!component) continue;
      planned.push(await this.planComponent(project, summary, component, resolver));
      planned.push(...(await this.planConstructs(project, summary, resolver)));
    }

    await this.store.transaction(async (tx) => {
      for (const entry of planned) {
        await this.writeMapping(tx, project.id, entry);
      }
      await markStaleExcept(tx, project.id, "Mapping", new Set(planned.map((entry) => entry.mapping.id)));
      await markStaleExcept(tx, project.id, "TargetComponent", new Set(planned.map((entry) => entry.mapping.target_ref)));
    });

    const result: MappingResult = {
      mappings: planned.map((entry) => entry.mapping),
      unresolved: planned.reduce((sum, entry) => sum + entry.mapping.unresolved.length, 0),
      customApplied: planned.filter((entry) => entry.mapping.is_custom).length,
      inferredTypes: resolver.inferredCount,
    };
    logger.info(
      { projectId: project.id, mappings: result.mappings.length, unresolved: result.unresolved },
      "mappings generated"
    );
    return result;
  }

  private async planComponent(
    project: ProjectEntity,
    summary: FileSummary,
    component: ComponentEntity,
    resolver: TypeResolver
  ): Promise<PlannedMapping> {
    const target = componentTarget(component.type, project.target_language, project.target_framework);
    const types = typesUsedBy(summary);
    const { mapping, problems } = await this.mapTypes(types, resolver, summary.file.path);

    return {
      mapping: {
        id: keys.mapping(component.id),
        source_ref: component.id,
        target_ref: keys.target(target.type, target.name),
        file_path: summary.file.path,
        construct: null,
        ...mapping,
      },
      source: nodeRef(project.id, "Component", component.id),
      target,
      problems,
    };
  }

  private async planConstructs(
    project: ProjectEntity,
    summary: FileSummary,
    resolver: TypeResolver
  ): Promise<PlannedMapping[]> {
    const planned: PlannedMapping[] = [];
    const filePath = summary.file.path;

    const constructs = [
      ...summary.classes
        .filter((cls) => LEGACY_CLASS_KINDS.has(cls.type))
        .map((cls) => ({
          ref: nodeRef(project.id, "Class", cls.id),
          construct: cls.type,
          label: `${cls.type} ${cls.name}`,
          types: cls.attributes.map((attribute) => attribute.type),
        })),
      ...summary.extensions.map((extension) => ({
        ref: nodeRef(project.id, "Extension", extension.id),
        construct: "extension",
        label: `extension of ${extension.base_type}`,
        types: [],
      })),
    ];

    for (const entry of constructs) {
      const { mapping, problems } = await this.mapTypes(entry.types, resolver, filePath);
      let target = constructTarget(entry.construct, project.target_language);
      if (!target) {
        problems.push(
          new UnmappableConstructError(`No ${project.target_language} replacement for ${entry.label}`, entry.label, {
            filePath,
            source: entry.ref.key,
          })
        );
        mapping.unresolved.push(entry.label);
        target = MANUAL_TARGET;
      }

      planned.push({
        mapping: {
          id: keys.mapping(entry.ref.key),
          source_ref: entry.ref.key,
          target_ref: keys.target(target.type, target.name),
          file_path: filePath,
          construct: entry.construct,
          ...mapping,
        },
        source: entry.ref,
        target,
        problems,
      });
    }
    return planned;
  }

  private async mapTypes(
    types: string[],
    resolver: TypeResolver,
    filePath: string
  ): Promise<{
    mapping: Pick<MappingEntity, "data_type_mapping" | "is_custom" | "unresolved" | "provenance">;
    problems: UnmappableConstructError[];
  }> {
    const dataTypeMapping: Record<string, string> = {};
    const unresolved: string[] = [];
    const problems: UnmappableConstructError[] = [];
    let custom = false;
    let inferred = false;

    for (const typeName of types) {
      const resolution = await resolver.resolve(typeName, filePath);
      if (resolution.target === null) {
        unresolved.push(typeName);
        problems.push(
          new UnmappableConstructError(`No target type for ${typeName}`, typeName, { filePath })
        );
        continue;
      }
      dataTypeMapping[typeName] = resolution.target;
      custom ||= resolution.custom;
      inferred ||= resolution.provenance === "inference";
    }

    return {
      mapping: {
        data_type_mapping: dataTypeMapping,
        is_custom: custom,
        unresolved,
        provenance: inferred ? "inference" : "syntax",
      },
      problems,
    };
  }

  private async writeMapping(tx: ITransaction, projectId: string, entry: PlannedMapping): Promise<void> {
    const mappingRef = nodeRef(projectId, "Mapping", entry.mapping.id);
    const targetKey = entry.mapping.target_ref;
    const targetRef = nodeRef(projectId, "TargetComponent", targetKey);

    await tx.upsertNode(targetRef, {
      id: targetKey,
      name: entry.target.name,
      version: null,
      type: entry.target.type,
      stale: false,
    });
    await tx.upsertNode(mappingRef, { ...entry.mapping, stale: false });
    await tx.upsertEdge("MAPS_TO", entry.source, mappingRef);
    await tx.upsertEdge("TARGETS", mappingRef, targetRef);

    for (const problem of entry.problems) {
      await writeFeedback(tx, projectId, {
        kind: "UnmappableConstructError",
        subject: `${entry.mapping.file_path}:${problem.construct}`,
        issue: problem.message,
        component: entry.mapping.file_path,
        details: { code: problem.code, construct: problem.construct, mapping: entry.mapping.id },
      });
    }
  }
}

/**
 * Annotation types used by a file's functions and classes, in first-use
 * order.
 */
export function typesUsedBy(summary: FileSummary): string[] {
  const types: string[] = [];
  for (const fn of summary.functions) {
    types.push(fn.return_type, ...fn.arguments.map((arg) => arg.type));
  }
  for (const cls of summary.classes) {
    types.push(...cls.attributes.map((attribute) => attribute.type));
    for (const method of cls.methods) {
      types.push(method.return_type, ...method.arguments.map((arg) => arg.type));
    }
  }
  return [...new Set(types)];
}

// =============================================================================
// Type Resolution
// =============================================================================

/**
 * Custom overrides first, then the tables, then inference. Inference
 * answers are shared across files within one run.
 */
class TypeResolver {
  inferredCount = 0;
  private readonly sourceLanguage: string;
  private readonly inferred = new Map<string, Promise<string | null>>();

  constructor(
    private readonly project: ProjectEntity,
    private readonly knownTypes: ReadonlySet<string>,
    private readonly inference: IInferenceService | null
  ) {
    this.sourceLanguage = project.source_language ?? DEFAULT_SOURCE_LANGUAGE;
  }

  async resolve(typeName: string, filePath: string): Promise<TypeResolution> {
    const override = this.project.custom_mappings[typeName];
    if (override !== undefined) {
      return { target: override, provenance: "syntax", custom: true };
    }

    const mapped = mapDataType(typeName, this.sourceLanguage, this.project.target_language, this.knownTypes);
    if (mapped.target !== null) {
      return { target: mapped.target, provenance: "syntax", custom: false };
    }

    const answer = await this.infer(typeName, filePath);
    return answer === null
      ? { target: null, provenance: "default", custom: false }
      : { target: answer, provenance: "inference", custom: false };
  }

  private infer(typeName: string, filePath: string): Promise<string | null> {
    const inference = this.inference;
    if (!inference) return Promise.resolve(null);

    let pending = this.inferred.get(typeName);
    if (!pending) {
      pending = inference
        .mapType({
          sourceLanguage: this.sourceLanguage,
          targetLanguage: this.project.target_language,
          targetFramework: this.project.target_framework,
          typeName,
          filePath,
        })
        .then((response) => {
          if (response.target_type !== null) this.inferredCount++;
          return response.target_type;
        })
        .catch((error: unknown) => {
          if (error instanceof TransientInferenceError) {
            logger.debug({ typeName, code: error.code }, "type mapping inference failed");
            return null;
          }
          throw error;
        });
      this.inferred.set(typeName, pending);
    }
    return pending;
  }
}
