/**
 * File Dependency Graph
 *
 * In-memory view of a project's IMPORTS and REFERENCES edges, fetched once.
 * Closures, cycle detection, cycle breaking and the topological order all
 * run synchronously over this view.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import type { IGraphReader } from "../interfaces/IGraphStore.js";
import { readNodes } from "../graph/graph-access.js";
import { FileSchema } from "../../types/entities.js";

const logger = createLogger("dependency-graph");

// =============================================================================
// Types
// =============================================================================

export interface FileNode {
  path: string;
  discoveryIndex: number;
  /** Files this file imports or references */
  dependsOn: Set<string>;
  /** Files that import or reference this file */
  dependedBy: Set<string>;
}

export type FileGraph = Map<string, FileNode>;

export interface CycleInfo {
  /** Files of the strongly connected component, sorted */
  members: string[];
  /** Edges removed to make the component acyclic, as [from, to] */
  brokenEdges: Array<[string, string]>;
}

export interface ClosureSizes {
  /** Files reachable within the configured depth */
  bounded: number;
  /** Files reachable at any depth */
  full: number;
}

// =============================================================================
// Graph Building
// =============================================================================

/**
 * Build the file graph from the store. Stale files and edges touching them
 * are left out.
 */
export async function buildFileGraph(reader: IGraphReader, projectId: string): Promise<FileGraph> {
  const graph: FileGraph = new Map();

  const files = await readNodes(reader, projectId, "File", FileSchema);
  for (const file of files) {
    if (file.properties.stale === true) continue;
    graph.set(file.entity.path, {
      path: file.entity.path,
      discoveryIndex: file.entity.discovery_index,
      dependsOn: new Set(),
      dependedBy: new Set(),
    });
  }

  const { rows } = await reader.query({
    kind: "edges",
    projectId,
    types: ["IMPORTS", "REFERENCES"],
    fromLabel: "File",
    toLabel: "File",
  });
  let edgeCount = 0;
  for (const edge of rows) {
    if (addEdge(graph, edge.from.key, edge.to.key)) edgeCount++;
  }

  logger.debug({ projectId, files: graph.size, edges: edgeCount }, "file graph built");
  return graph;
}

/**
 * Adds `from -> to` when both files are in the graph.
 *
 * @returns whether a new edge was added
 */
export function addEdge(graph: FileGraph, from: string, to: string): boolean {
  const source = graph.get(from);
  const target = graph.get(to);
  if (!source || !target || source.dependsOn.has(to)) return false;
  source.dependsOn.add(to);
  target.dependedBy.add(from);
  return true;
}

function removeEdge(graph: FileGraph, from: string, to: string): void {
  graph.get(from)?.dependsOn.delete(to);
  graph.get(to)?.dependedBy.delete(from);
}

export function cloneGraph(graph: FileGraph): FileGraph {
  const copy: FileGraph = new Map();
  for (const [id, node] of graph) {
    copy.set(id, { ...node, dependsOn: new Set(node.dependsOn), dependedBy: new Set(node.dependedBy) });
  }
  return copy;
}

function sorted(values: Iterable<string>): string[] {
  return [...values].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

// =============================================================================
// Closures
// =============================================================================

/**
 * Files reachable from `start`, breadth first. The visited set keeps the
 * walk finite on cycles; the start file is never counted.
 */
export function reachable(graph: FileGraph, start: string, maxDepth: number = Number.POSITIVE_INFINITY): Map<string, number> {
  const distances = new Map<string, number>();
  const visited = new Set<string>([start]);
  let frontier = [start];

  for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth++) {
    const next: string[] = [];
    for (const id of frontier) {
      for (const dependency of sorted(graph.get(id)?.dependsOn ?? [])) {
        if (visited.has(dependency)) continue;
        visited.add(dependency);
        distances.set(dependency, depth);
        next.push(dependency);
      }
    }
    frontier = next;
  }
  return distances;
}

export function computeClosureSizes(graph: FileGraph, boundedDepth: number): Map<string, ClosureSizes> {
  const sizes = new Map<string, ClosureSizes>();
  for (const id of graph.keys()) {
    const full = reachable(graph, id);
    let bounded = 0;
    for (const depth of full.values()) {
      if (depth <= boundedDepth) bounded++;
    }
    sizes.set(id, { bounded, full: full.size });
  }
  return sizes;
}

// =============================================================================
// Cycles
// =============================================================================

/**
 * Find Strongly Connected Components using Tarjan's algorithm
 *
 * Only real cycles are returned: components with more than one file, or a
 * single file that depends on itself. Members are sorted; components come
 * back ordered by their lowest member. The depth-first walk keeps its own
 * frame stack, so chain length is not bounded by the call stack.
 */
export function findSCCs(graph: FileGraph, nodeSet: ReadonlySet<string> = new Set(graph.keys())): string[][] {
  const index = new Map<string, number>();
  const lowlink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const sccs: string[][] = [];
  let currentIndex = 0;

  interface Frame {
    nodeId: string;
    deps: string[];
    next: number;
  }

  function open(nodeId: string): Frame {
    index.set(nodeId, currentIndex);
    lowlink.set(nodeId, currentIndex);
    currentIndex++;
    stack.push(nodeId);
    onStack.add(nodeId);
    return { nodeId, deps: sorted(graph.get(nodeId)?.dependsOn ?? []).filter((id) => nodeSet.has(id)), next: 0 };
  }

  function lower(nodeId: string, value: number | undefined): void {
    lowlink.set(nodeId, Math.min(lowlink.get(nodeId) ?? 0, value ?? 0));
  }

  function close(nodeId: string): void {
    if (lowlink.get(nodeId) !== index.get(nodeId)) return;

    const scc: string[] = [];
    let member: string | undefined;
    do {
      member = stack.pop();
      if (member === undefined) break;
      onStack.delete(member);
      scc.push(member);
    } while (member !== nodeId);

    const selfLoop = scc.length === 1 && graph.get(nodeId)?.dependsOn.has(nodeId) === true;
    if (scc.length > 1 || selfLoop) {
      sccs.push(sorted(scc));
    }
  }

  for (const root of sorted(nodeSet)) {
    if (index.has(root)) continue;

    const frames: Frame[] = [open(root)];
    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (!frame) break;

      const depId = frame.deps[frame.next++];
      if (depId !== undefined) {
        if (!index.has(depId)) {
          frames.push(open(depId));
        } else if (onStack.has(depId)) {
          lower(frame.nodeId, index.get(depId));
        }
        continue;
      }

      frames.pop();
      close(frame.nodeId);
      const parent = frames[frames.length - 1];
      if (parent) lower(parent.nodeId, lowlink.get(frame.nodeId));
    }
  }

  return sccs.sort((a, b) => ((a[0] ?? "") < (b[0] ?? "") ? -1 : 1));
}

/**
 * Breaks every cycle deterministically. Within each strongly connected
 * component the lexicographically lowest path drops its edges into the
 * component; sub-cycles left behind are broken the same way until the
 * component is acyclic.
 *
 * @returns the acyclic copy and one CycleInfo per original component
 */
export function breakCycles(graph: FileGraph): { acyclic: FileGraph; cycles: CycleInfo[] } {
  const acyclic = cloneGraph(graph);
  const cycles: CycleInfo[] = [];

  for (const members of findSCCs(graph)) {
    const scope = new Set(members);
    const brokenEdges: Array<[string, string]> = [];

    for (let remaining = findSCCs(acyclic, scope); remaining.length > 0; remaining = findSCCs(acyclic, scope)) {
      for (const component of remaining) {
        const lowest = component[0];
        if (lowest === undefined) continue;
        const inside = new Set(component);
        for (const target of sorted(acyclic.get(lowest)?.dependsOn ?? [])) {
          if (!inside.has(target)) continue;
          removeEdge(acyclic, lowest, target);
          brokenEdges.push([lowest, target]);
        }
      }
    }

    cycles.push({ members, brokenEdges });
  }

  if (cycles.length > 0) {
    logger.debug(
      { cycles: cycles.length, brokenEdges: cycles.reduce((sum, cycle) => sum + cycle.brokenEdges.length, 0) },
      "cycles broken"
    );
  }
  return { acyclic, cycles };
}

// =============================================================================
// Topological Sort
// =============================================================================

/**
 * Kahn's algorithm over an acyclic graph: dependencies come before their
 * dependents, and among files that are ready at the same time the lowest
 * discovery index goes first.
 */
export function topologicalOrder(graph: FileGraph): string[] {
  const remainingDeps = new Map<string, number>();
  const ready: FileNode[] = [];
  for (const node of graph.values()) {
    remainingDeps.set(node.path, node.dependsOn.size);
    if (node.dependsOn.size === 0) ready.push(node);
  }

  const byDiscovery = (a: FileNode, b: FileNode): number =>
    a.discoveryIndex - b.discoveryIndex || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0);

  const order: string[] = [];
  while (ready.length > 0) {
    ready.sort(byDiscovery);
    const node = ready.shift();
    if (!node) break;
    order.push(node.path);

    for (const dependentId of node.dependedBy) {
      const left = (remainingDeps.get(dependentId) ?? 0) - 1;
      remainingDeps.set(dependentId, left);
      const dependent = graph.get(dependentId);
      if (left === 0 && dependent) ready.push(dependent);
    }
  }

  if (order.length < graph.size) {
    const placed = new Set(order);
    const leftover = [...graph.values()].filter((node) => !placed.has(node.path)).sort(byDiscovery);
    logger.warn({ leftover: leftover.length }, "graph still cyclic; appending remaining files in discovery order");
    order.push(...leftover.map((node) => node.path));
  }

  return order;
}
