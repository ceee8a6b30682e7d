/**
 * Cross-file link resolution
 *
 * Runs after every file of a project has been extracted. Each pending
 * import becomes an IMPORTS edge when one of its candidate paths is a live
 * File of the project, or a DEPENDS_ON edge to a Dependency node when none
 * is. Pending references resolve to REFERENCES edges the same way.
 *
 * Every run rewrites the link edges of the whole project: an edge a file
 * no longer declares, or one that touches a stale file, is removed in the
 * same transaction.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { IGraphStore, NodeRef } from "../interfaces/IGraphStore.js";
import { edgeUid } from "../graph/constraints.js";
import type { RelationshipType } from "../graph/schema.js";
import { fileRef, keys, nodeRef, readNodes } from "../graph/graph-access.js";
import { FileSchema, type PendingLink, type ProjectEntity, type PropertyBag } from "../../types/entities.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("reference-resolver");

export interface ResolutionResult {
  imports: number;
  references: number;
  dependencies: number;
  /** Link edges from an earlier run that no longer hold */
  retracted: number;
}

const LINK_TYPES: RelationshipType[] = ["IMPORTS", "REFERENCES", "DEPENDS_ON"];

interface DependencyUse {
  name: string;
  type: "external" | "internal";
  files: Map<string, string[]>;
}

/**
 * Name a Dependency node gets: the top-level package for absolute imports
 * (`numpy.linalg` -> `numpy`), the dotted module as written for relative ones.
 */
export function dependencyName(link: PendingLink): string {
  if (link.relative) return link.module;
  return link.module.split(".")[0] ?? link.module;
}

function normalizePackage(name: string): string {
  return name.toLowerCase().replace(/-/g, "_");
}

/**
 * Pinned versions from a requirements.txt at the project root, keyed by
 * normalized package name.
 */
export async function readRequirementVersions(sourceDir: string): Promise<Map<string, string>> {
  const versions = new Map<string, string>();
  let content: string;
  try {
    content = await fs.readFile(path.join(sourceDir, "requirements.txt"), "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return versions;
    throw error;
  }
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.replace(/#.*$/, "").trim();
    const match = /^([A-Za-z0-9_.-]+)\s*(?:\[[^\]]*\])?\s*(==|>=|~=|<=)\s*([^\s;,]+)/.exec(line);
    if (match?.[1] && match[2] && match[3]) {
      versions.set(normalizePackage(match[1]), `${match[2] === "==" ? "" : match[2]}${match[3]}`);
    }
  }
  return versions;
}

export async function resolvePendingLinks(store: IGraphStore, project: ProjectEntity): Promise<ResolutionResult> {
  const files = (await readNodes(store, project.id, "File", FileSchema)).filter(
    (file) => file.properties.stale !== true
  );
  const known = new Set(files.map((file) => file.entity.path));
  const versions = await readRequirementVersions(project.source_dir);
  const result: ResolutionResult = { imports: 0, references: 0, dependencies: 0, retracted: 0 };

  const resolve = (link: PendingLink, from: string): string | undefined =>
    link.candidates.find((candidate) => candidate !== from && known.has(candidate));

  await store.transaction(async (tx) => {
    const dependencies = new Map<string, DependencyUse>();
    const previous = await tx.query({ kind: "edges", projectId: project.id, types: LINK_TYPES, fromLabel: "File" });
    const written = new Set<string>();
    const link = async (type: RelationshipType, from: NodeRef, to: NodeRef, properties: PropertyBag) => {
      await tx.upsertEdge(type, from, to, properties);
      written.add(edgeUid(type, from, to));
    };

    for (const { entity: file } of files) {
      const source = fileRef(project.id, file.path);

      for (const pending of file.pending_imports) {
        const target = resolve(pending, file.path);
        if (target) {
          await link("IMPORTS", source, fileRef(project.id, target), { module: pending.module });
          result.imports++;
          continue;
        }
        const name = dependencyName(pending);
        const use: DependencyUse = dependencies.get(name) ?? {
          name,
          type: pending.relative ? "internal" : "external",
          files: new Map<string, string[]>(),
        };
        use.files.set(file.path, [...(use.files.get(file.path) ?? []), pending.module]);
        dependencies.set(name, use);
      }

      for (const pending of file.pending_references) {
        const target = resolve(pending, file.path);
        if (!target) continue;
        await link("REFERENCES", source, fileRef(project.id, target), { module: pending.module });
        result.references++;
      }
    }

    for (const use of dependencies.values()) {
      const key = keys.dependency(use.name);
      const ref = nodeRef(project.id, "Dependency", key);
      await tx.upsertNode(ref, {
        id: key,
        name: use.name,
        version: versions.get(normalizePackage(use.name)) ?? null,
        type: use.type,
      });
      for (const [filePath, modules] of use.files) {
        await link("DEPENDS_ON", fileRef(project.id, filePath), ref, { modules: [...new Set(modules)] });
      }
    }
    result.dependencies = dependencies.size;

    for (const edge of previous.rows) {
      if (written.has(edgeUid(edge.type, edge.from, edge.to))) continue;
      await tx.removeEdge(edge.type, edge.from, edge.to);
      result.retracted++;
    }
  });

  logger.debug({ projectId: project.id, ...result }, "links resolved");
  return result;
}
