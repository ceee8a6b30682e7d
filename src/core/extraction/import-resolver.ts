/**
 * Python import targets
 *
 * Turns an import statement into pending links: candidate project-relative
 * paths in preference order. Candidates are checked against the project's
 * File nodes only after every file has been scanned.
 *
 * @module
 */

import * as path from "node:path";
import type { PendingLink } from "../../types/entities.js";
import type { SkeletonImport } from "../../types/skeleton.js";

function moduleFiles(base: string): string[] {
  return [`${base}.py`, `${base}/__init__.py`];
}

function join(...parts: string[]): string {
  const joined = path.posix.join(...parts.filter((part) => part.length > 0));
  return joined === "." ? "" : joined;
}

function uniq(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Directory `level` dots refer to, or null when it climbs above the
 * project root. One dot is the importing file's own directory.
 */
function relativeBase(fileDir: string, level: number): string | null {
  const segments = fileDir === "" ? [] : fileDir.split("/");
  const up = level - 1;
  if (up > segments.length) return null;
  return segments.slice(0, segments.length - up).join("/");
}

/**
 * Candidate paths for an absolute module, tried from the project root
 * first and then beside the importing file.
 */
function absoluteCandidates(modulePath: string, fileDir: string): string[] {
  const roots = fileDir === "" ? [""] : ["", fileDir];
  return roots.flatMap((root) => moduleFiles(join(root, modulePath)));
}

/**
 * @example
 * ```typescript
 * importLinks({ module: "a.b", names: [], level: 0, ... }, "main.py");
 * // [{ module: "a.b", candidates: ["a/b.py", "a/b/__init__.py"], relative: false }]
 * ```
 */
export function importLinks(entry: SkeletonImport, filePath: string): PendingLink[] {
  const fileDir = path.posix.dirname(filePath) === "." ? "" : path.posix.dirname(filePath);
  const modulePath = entry.module.split(".").filter(Boolean).join("/");
  const relative = entry.level > 0;
  const displayName = `${".".repeat(entry.level)}${entry.module}`;

  if (!relative && entry.names.length === 0) {
    return [{ module: displayName, candidates: uniq(absoluteCandidates(modulePath, fileDir)), relative }];
  }

  let containers: string[];
  if (relative) {
    const base = relativeBase(fileDir, entry.level);
    if (base === null) {
      return [{ module: displayName, candidates: [], relative }];
    }
    containers = [join(base, modulePath)];
  } else {
    containers = fileDir === "" ? [modulePath] : [modulePath, join(fileDir, modulePath)];
  }

  // `from . import x` names the package itself, never a sibling module
  const moduleItself = (container: string): string[] => {
    if (container === "") return ["__init__.py"];
    return modulePath === "" ? [`${container}/__init__.py`] : moduleFiles(container);
  };
  const names = entry.names.filter((name) => name !== "*");

  if (names.length === 0) {
    return [{ module: displayName, candidates: uniq(containers.flatMap(moduleItself)), relative }];
  }

  // `from pkg import name` may bind a submodule or a member of pkg
  return names.map((name) => {
    const candidates = containers.flatMap((container) => [
      ...moduleFiles(join(container, name)),
      ...moduleItself(container),
    ]);
    return { module: displayName, candidates: uniq(candidates), relative };
  });
}

/**
 * Whether a module name could belong to the project rather than a library:
 * relative, or rooted at a top-level directory or module of the project.
 */
export function isProjectModule(entry: SkeletonImport, topLevelNames: ReadonlySet<string>): boolean {
  if (entry.level > 0) return true;
  const first = entry.module.split(".")[0] ?? "";
  return topLevelNames.has(first);
}

/**
 * First path segment of every project file, with `.py` stripped.
 */
export function topLevelModuleNames(paths: Iterable<string>): Set<string> {
  const names = new Set<string>();
  for (const filePath of paths) {
    const first = filePath.split("/")[0] ?? filePath;
    names.add(first.endsWith(".py") ? first.slice(0, -3) : first);
  }
  return names;
}
