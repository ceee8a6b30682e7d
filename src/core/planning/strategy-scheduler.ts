/**
 * Strategy Scheduler
 *
 * Orders components so that every file migrates after the files it
 * depends on, then writes one Strategy per component with the actions its
 * mappings call for. Strategies of components that are gone are marked
 * stale, so priorities stay a total order over the live ones.
 *
 * @module
 */

import type { IGraphStore } from "../interfaces/IGraphStore.js";
import { keys, markStaleExcept, nodeRef, readLiveNodes } from "../graph/graph-access.js";
import { DependencyResolver } from "../analysis/dependency-resolver.js";
import { topologicalOrder, type CycleInfo } from "../analysis/dependency-graph.js";
import {
  ComponentSchema,
  MappingSchema,
  TargetComponentSchema,
  type ComponentEntity,
  type MappingEntity,
  type StrategyEntity,
} from "../../types/entities.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("strategy-scheduler");

export interface ScheduleResult {
  strategies: StrategyEntity[];
  /** File paths in migration order */
  order: string[];
  cycles: CycleInfo[];
}

interface ActionContext {
  component: ComponentEntity;
  componentMapping: MappingEntity | undefined;
  constructMappings: MappingEntity[];
  targetNames: Map<string, string>;
  cycle: CycleInfo | undefined;
}

/**
 * Ordered action list for one component.
 */
export function buildActions(context: ActionContext): string[] {
  const { component, componentMapping, constructMappings, targetNames, cycle } = context;
  const actions: string[] = [];

  if (cycle) {
    actions.push(`Review dependency cycle: ${cycle.members.join(", ")}`);
  }

  const target = componentMapping ? targetNames.get(componentMapping.target_ref) : undefined;
  switch (component.type) {
    case "ui":
      actions.push(`Rebuild view as ${target ?? "target UI component"}`);
      break;
    case "data":
      actions.push(`Port data model to ${target ?? "target data model"}`);
      break;
    case "config":
      actions.push(`Convert configuration to ${target ?? "target configuration"}`);
      break;
    case "logic":
      actions.push(`Port logic to ${target ?? "target module"}`);
      break;
    case "unknown":
      actions.push("Review manually: component type unknown");
      break;
  }

  for (const mapping of constructMappings) {
    const replacement = targetNames.get(mapping.target_ref) ?? mapping.target_ref;
    actions.push(`Replace ${mapping.construct ?? "construct"} ${nameOf(mapping.source_ref)} with ${replacement}`);
  }

  const typeCount = Object.keys(componentMapping?.data_type_mapping ?? {}).length;
  if (typeCount > 0) {
    actions.push(`Apply data type mapping (${typeCount} type${typeCount === 1 ? "" : "s"})`);
  }

  const unresolved = [componentMapping, ...constructMappings].flatMap((mapping) => mapping?.unresolved ?? []);
  for (const construct of unresolved) {
    actions.push(`Resolve unmapped construct: ${construct}`);
  }

  return actions;
}

/** Entity name from a natural key such as `a.py#class:Config` */
function nameOf(sourceKey: string): string {
  const marker = sourceKey.lastIndexOf(":");
  return marker === -1 ? sourceKey : sourceKey.slice(marker + 1);
}

export class StrategyScheduler {
  private readonly resolver: DependencyResolver;

  constructor(
    private readonly store: IGraphStore,
    closureDepth: number
  ) {
    this.resolver = new DependencyResolver(store, closureDepth);
  }

  async schedule(projectId: string): Promise<ScheduleResult> {
    const [analysis, components, mappings, targets] = await Promise.all([
      this.resolver.analyze(projectId),
      readLiveNodes(this.store, projectId, "Component", ComponentSchema),
      readLiveNodes(this.store, projectId, "Mapping", MappingSchema),
      readLiveNodes(this.store, projectId, "TargetComponent", TargetComponentSchema),
    ]);

    const componentByPath = new Map(components.map((node) => [node.entity.file_path, node.entity]));
    const targetNames = new Map(targets.map((node) => [node.entity.id, node.entity.name]));
    const mappingsByPath = new Map<string, MappingEntity[]>();
    for (const { entity } of mappings) {
      const list = mappingsByPath.get(entity.file_path) ?? [];
      list.push(entity);
      mappingsByPath.set(entity.file_path, list);
    }

    const order = topologicalOrder(analysis.acyclic).filter((path) => componentByPath.has(path));
    const strategies: StrategyEntity[] = [];

    order.forEach((filePath, index) => {
      const component = componentByPath.get(filePath);
      if (!component) return;
      const fileMappings = mappingsByPath.get(filePath) ?? [];

      strategies.push({
        id: keys.strategy(filePath),
        component_ref: component.id,
        file_path: filePath,
        priority: index + 1,
        actions: buildActions({
          component,
          componentMapping: fileMappings.find((mapping) => mapping.construct === null),
          constructMappings: fileMappings.filter((mapping) => mapping.construct !== null),
          targetNames,
          cycle: analysis.cycles.find((cycle) => cycle.members.includes(filePath)),
        }),
        depends_on: [...(analysis.acyclic.get(filePath)?.dependsOn ?? [])].sort(),
      });
    });

    await this.store.transaction(async (tx) => {
      for (const strategy of strategies) {
        const ref = nodeRef(projectId, "Strategy", strategy.id);
        await tx.upsertNode(ref, { ...strategy, stale: false });
        await tx.upsertEdge("PLANNED_IN", nodeRef(projectId, "Component", strategy.component_ref), ref);
      }
      await markStaleExcept(tx, projectId, "Strategy", new Set(strategies.map((strategy) => strategy.id)));
    });

    logger.info({ projectId, strategies: strategies.length, cycles: analysis.cycles.length }, "strategies scheduled");
    return { strategies, order, cycles: analysis.cycles };
  }
}
