/**
 * Dependency Resolver
 *
 * Read-only analysis of a project's file graph: the dependency cycles and
 * closure sizes per file, measured once the cycles are broken. Results go
 * back onto File nodes and into DependencyCycle reports.
 *
 * @module
 */

import type { IGraphStore } from "../interfaces/IGraphStore.js";
import { fileRef } from "../graph/graph-access.js";
import { writeReport } from "../audit/audit-trail.js";
import { createLogger } from "../../utils/logger.js";
import {
  breakCycles,
  buildFileGraph,
  computeClosureSizes,
  type ClosureSizes,
  type CycleInfo,
  type FileGraph,
} from "./dependency-graph.js";

const logger = createLogger("dependency-resolver");

export interface DependencyAnalysis {
  graph: FileGraph;
  acyclic: FileGraph;
  cycles: CycleInfo[];
  closures: Map<string, ClosureSizes>;
}

export const CYCLE_REPORT = "DependencyCycle";

export function cycleSubject(cycle: CycleInfo): string {
  return cycle.members.join("|");
}

export class DependencyResolver {
  constructor(
    private readonly store: IGraphStore,
    private readonly closureDepth: number
  ) {}

  /**
   * Computes closures and cycles without writing anything.
   */
  async analyze(projectId: string): Promise<DependencyAnalysis> {
    const graph = await buildFileGraph(this.store, projectId);
    const { acyclic, cycles } = breakCycles(graph);
    const closures = computeClosureSizes(acyclic, this.closureDepth);
    return { graph, acyclic, cycles, closures };
  }

  /**
   * Analyzes and records: closure sizes on every File, one report per cycle.
   */
  async resolve(projectId: string): Promise<DependencyAnalysis> {
    const analysis = await this.analyze(projectId);

    await this.store.transaction(async (tx) => {
      for (const [filePath, sizes] of analysis.closures) {
        await tx.upsertNode(fileRef(projectId, filePath), {
          closure_bounded_size: sizes.bounded,
          closure_depth: this.closureDepth,
          closure_size: sizes.full,
          in_cycle: analysis.cycles.some((cycle) => cycle.members.includes(filePath)),
        });
      }

      for (const cycle of analysis.cycles) {
        await writeReport(tx, projectId, {
          kind: CYCLE_REPORT,
          subject: cycleSubject(cycle),
          message: `Dependency cycle between ${cycle.members.length} file(s): ${cycle.members.join(", ")}`,
          details: {
            members: cycle.members,
            broken_edges: cycle.brokenEdges.map(([from, to]) => ({ from, to })),
          },
        });
      }
    });

    logger.info(
      { projectId, files: analysis.graph.size, cycles: analysis.cycles.length },
      "dependency analysis recorded"
    );
    return analysis;
  }
}
