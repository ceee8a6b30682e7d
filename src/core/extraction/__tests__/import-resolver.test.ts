import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { importLinks, isProjectModule, topLevelModuleNames } from "../import-resolver.js";
import { dependencyName, readRequirementVersions } from "../reference-resolver.js";
import type { SkeletonImport } from "../../../types/skeleton.js";

function imp(module: string, names: string[] = [], level = 0): SkeletonImport {
  return { module, names, level, bindings: [], referenced: false, line: 1 };
}

describe("importLinks", () => {
  it("should try a root-level module as a file and as a package", () => {
    expect(importLinks(imp("a.b"), "main.py")).toEqual([
      { module: "a.b", candidates: ["a/b.py", "a/b/__init__.py"], relative: false },
    ]);
  });

  it("should fall back to the importing file's directory for absolute imports", () => {
    expect(importLinks(imp("utils"), "pkg/main.py")[0]?.candidates).toEqual([
      "utils.py",
      "utils/__init__.py",
      "pkg/utils.py",
      "pkg/utils/__init__.py",
    ]);
  });

  it("should resolve `from . import name` inside the current package", () => {
    expect(importLinks(imp("", ["helpers"], 1), "pkg/sub/mod.py")).toEqual([
      {
        module: ".",
        candidates: ["pkg/sub/helpers.py", "pkg/sub/helpers/__init__.py", "pkg/sub/__init__.py"],
        relative: true,
      },
    ]);
  });

  it("should climb one directory per extra dot", () => {
    expect(importLinks(imp("core", ["models"], 2), "pkg/sub/mod.py")).toEqual([
      {
        module: "..core",
        candidates: ["pkg/core/models.py", "pkg/core/models/__init__.py", "pkg/core.py", "pkg/core/__init__.py"],
        relative: true,
      },
    ]);
  });

  it("should produce one link per imported name", () => {
    const links = importLinks(imp("models", ["User", "Order"]), "main.py");
    expect(links.map((link) => link.candidates[0])).toEqual(["models/User.py", "models/Order.py"]);
  });

  it("should leave no candidates when a relative import climbs above the root", () => {
    expect(importLinks(imp("", ["x"], 3), "a.py")).toEqual([{ module: "...", candidates: [], relative: true }]);
  });

  it("should point wildcard imports at the module itself", () => {
    expect(importLinks(imp("utils", ["*"]), "main.py")[0]?.candidates).toEqual(["utils.py", "utils/__init__.py"]);
    expect(importLinks(imp("", ["*"], 1), "main.py")[0]?.candidates).toEqual(["__init__.py"]);
  });
});

describe("project module detection", () => {
  it("should collect top-level names with .py stripped", () => {
    expect([...topLevelModuleNames(["main.py", "pkg/a.py", "pkg/b.py", "utils.py"])]).toEqual([
      "main",
      "pkg",
      "utils",
    ]);
  });

  it("should treat relative imports and project roots as project modules", () => {
    const names = new Set(["pkg", "utils"]);
    expect(isProjectModule(imp("", ["x"], 1), names)).toBe(true);
    expect(isProjectModule(imp("pkg.models"), names)).toBe(true);
    expect(isProjectModule(imp("numpy"), names)).toBe(false);
  });
});

describe("dependencyName", () => {
  it("should use the top-level package for absolute modules", () => {
    expect(dependencyName({ module: "numpy.linalg", candidates: [], relative: false })).toBe("numpy");
  });

  it("should keep relative modules as written", () => {
    expect(dependencyName({ module: "..core", candidates: [], relative: true })).toBe("..core");
  });
});

describe("readRequirementVersions", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "requirements-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should read pinned and bounded versions", async () => {
    await fs.writeFile(
      path.join(tempDir, "requirements.txt"),
      ["numpy==1.26.0", "Requests>=2.31  # http", "flask[async]~=3.0", "# comment", "pytest", ""].join("\n")
    );

    const versions = await readRequirementVersions(tempDir);

    expect(Object.fromEntries(versions)).toEqual({ numpy: "1.26.0", requests: ">=2.31", flask: "~=3.0" });
  });

  it("should return an empty map without a requirements file", async () => {
    expect((await readRequirementVersions(tempDir)).size).toBe(0);
  });
});
