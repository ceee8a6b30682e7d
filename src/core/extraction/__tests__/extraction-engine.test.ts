/**
 * ExtractionEngine Tests
 *
 * Structure and content passes against a real Python grammar and the
 * in-process graph store.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ExtractionEngine } from "../extraction-engine.js";
import { MemoryGraphStore } from "../../graph/memory-graph-store.js";
import { TreeSitterParser } from "../../parser/tree-sitter-parser.js";
import { fileRef } from "../../graph/graph-access.js";
import { listFeedback, listReports } from "../../audit/audit-trail.js";
import type { IInferenceService } from "../../interfaces/IInferenceService.js";
import type { ExtractionConfig } from "../../../utils/validation.js";
import type { ProjectEntity } from "../../../types/entities.js";
import {
  FakeInference,
  makeProject,
  makeTempDir,
  removeTempDir,
  saveProject,
  writeTree,
} from "../../../test-utils/fixtures.js";

const MAIN_PY = [
  "import utils",
  "",
  "",
  "class DataProcessor:",
  "    _instance = None",
  "",
  "    def process(self) -> dict:",
  "        return {}",
  "",
  "",
  "def main(args: list):",
  "    return DataProcessor().process()",
  "",
].join("\n");

const UTILS_PY = 'VERSION = "1.0"\n';

describe("ExtractionEngine", () => {
  const parser = new TreeSitterParser();
  let store: MemoryGraphStore;
  let tempDir: string;
  let project: ProjectEntity;
  let config: ExtractionConfig;

  beforeAll(async () => {
    await parser.initialize();
  });

  afterAll(async () => {
    await parser.close();
  });

  beforeEach(async () => {
    tempDir = await makeTempDir("extraction-test");
    store = new MemoryGraphStore();
    await store.initialize();
    project = makeProject("p1", tempDir);
    await saveProject(store, project);
    config = { concurrency: 2, maxFileSize: 500 * 1024, ignorePatterns: [] };
  });

  afterEach(async () => {
    await store.close();
    await removeTempDir(tempDir);
  });

  function engine(inference: IInferenceService | null = null): ExtractionEngine {
    return new ExtractionEngine({ store, parser, inference, config, maxInferenceChars: 1000 });
  }

  async function nodes(label: "File" | "Function" | "Class" | "Enum" | "Extension" | "Dependency") {
    const { rows } = await store.query({ kind: "nodes", projectId: "p1", label });
    return rows;
  }

  describe("two-file project", () => {
    beforeEach(async () => {
      await writeTree(tempDir, { "main.py": MAIN_PY, "utils.py": UTILS_PY });
    });

    it("should produce files, entities and the import edge", async () => {
      const extraction = engine();
      await extraction.runStructurePass(project);
      const result = await extraction.runContentPass(project);

      expect(result.parsed).toBe(2);
      expect(result.resolution.imports).toBe(1);

      expect((await nodes("File")).map((row) => row.key)).toEqual(["main.py", "utils.py"]);

      const functions = await nodes("Function");
      expect(functions).toHaveLength(1);
      expect(functions[0]?.properties).toMatchObject({
        name: "main",
        is_static: true,
        is_async: false,
        arguments: [{ name: "args", type: "list" }],
        return_type: "Any",
      });

      const classes = await nodes("Class");
      expect(classes).toHaveLength(1);
      expect(classes[0]?.properties).toMatchObject({
        name: "DataProcessor",
        type: "singleton",
        methods: [
          { name: "process", return_type: "dict", arguments: [], decorators: [], is_static: false, is_async: false },
        ],
      });

      const { rows: imports } = await store.query({ kind: "edges", projectId: "p1", types: ["IMPORTS"] });
      expect(imports.map((edge) => [edge.from.key, edge.to.key])).toEqual([["main.py", "utils.py"]]);
    });

    it("should link entities to their file", async () => {
      const extraction = engine();
      await extraction.runStructurePass(project);
      await extraction.runContentPass(project);

      const { rows } = await store.query({ kind: "edges", projectId: "p1", from: fileRef("p1", "main.py") });
      expect(rows.map((edge) => `${edge.type}:${edge.to.key}`).sort()).toEqual([
        "HAS_CLASS:main.py#class:DataProcessor",
        "HAS_FUNCTION:main.py#fn:main",
        "IMPORTS:utils.py",
      ]);
    });

    it("should not duplicate anything when run twice", async () => {
      const extraction = engine();
      await extraction.runStructurePass(project);
      await extraction.runContentPass(project);
      const before = await store.query({ kind: "nodes", projectId: "p1" });

      const structure = await extraction.runStructurePass(project);
      const content = await extraction.runContentPass(project, { force: true });
      const after = await store.query({ kind: "nodes", projectId: "p1" });

      expect(structure).toMatchObject({ files: 2, added: 0, changed: 0, unchanged: 2, removed: 0 });
      expect(content.parsed).toBe(2);
      expect(after.rows.map((row) => `${row.label}:${row.key}`)).toEqual(
        before.rows.map((row) => `${row.label}:${row.key}`)
      );
    });

    it("should skip unchanged files unless forced", async () => {
      const extraction = engine();
      await extraction.runStructurePass(project);
      await extraction.runContentPass(project);

      const again = await extraction.runContentPass(project);

      expect(again).toMatchObject({ parsed: 0, unchanged: 2 });
    });

    it("should mark entities a file no longer declares as stale", async () => {
      const extraction = engine();
      await extraction.runStructurePass(project);
      await extraction.runContentPass(project);

      await fs.writeFile(path.join(tempDir, "main.py"), "import utils\n");
      const structure = await extraction.runStructurePass(project);
      await extraction.runContentPass(project);

      expect(structure.changed).toBe(1);
      const { rows } = await store.query({
        kind: "nodes",
        projectId: "p1",
        label: "Function",
        where: { id: "main.py#fn:main" },
      });
      expect(rows[0]?.properties.stale).toBe(true);
    });

    it("should drop import edges a file no longer declares", async () => {
      const extraction = engine();
      await extraction.runStructurePass(project);
      await extraction.runContentPass(project);

      await fs.writeFile(path.join(tempDir, "main.py"), "X = 2\n");
      await fs.writeFile(path.join(tempDir, "utils.py"), "import main\n");
      await extraction.runStructurePass(project);
      const result = await extraction.runContentPass(project);

      expect(result.resolution).toEqual({ imports: 1, references: 0, dependencies: 0, retracted: 1 });
      const { rows } = await store.query({ kind: "edges", projectId: "p1", types: ["IMPORTS"] });
      expect(rows.map((edge) => [edge.from.key, edge.to.key])).toEqual([["utils.py", "main.py"]]);
    });

    it("should retarget imports of a deleted file to a dependency", async () => {
      const extraction = engine();
      await extraction.runStructurePass(project);
      await extraction.runContentPass(project);

      await fs.rm(path.join(tempDir, "utils.py"));
      await extraction.runStructurePass(project);
      await extraction.runContentPass(project);

      const { rows } = await store.query({ kind: "edges", projectId: "p1", types: ["IMPORTS", "DEPENDS_ON"] });
      expect(rows.map((edge) => `${edge.type}:${edge.from.key}->${edge.to.key}`)).toEqual([
        "DEPENDS_ON:main.py->dependency:utils",
      ]);
    });

    it("should mark deleted files as stale", async () => {
      const extraction = engine();
      await extraction.runStructurePass(project);

      await fs.rm(path.join(tempDir, "utils.py"));
      const structure = await extraction.runStructurePass(project);

      expect(structure.removed).toBe(1);
      const { rows } = await store.query({ kind: "nodes", projectId: "p1", label: "File", where: { path: "utils.py" } });
      expect(rows[0]?.properties.stale).toBe(true);
    });
  });

  describe("malformed input", () => {
    it("should keep the File node and report the parse failure", async () => {
      await writeTree(tempDir, { "broken.py": "def broken(:\n    pass\n", "ok.py": "def ok():\n    pass\n" });
      const extraction = engine();
      await extraction.runStructurePass(project);
      const result = await extraction.runContentPass(project);

      expect(result).toMatchObject({ parsed: 1, malformed: 1 });

      const broken = (await nodes("File")).find((row) => row.key === "broken.py");
      expect(broken?.properties).toMatchObject({ path: "broken.py", size: 22, parse_status: "malformed" });

      const functions = await nodes("Function");
      expect(functions.map((row) => row.key)).toEqual(["ok.py#fn:ok"]);

      const reports = await listReports(store, "p1", "MalformedInputError");
      expect(reports).toHaveLength(1);
      expect(reports[0]?.id).toBe("report:MalformedInputError:broken.py");
      expect(reports[0]?.details.line).toBe(1);
    });
  });

  describe("size limit", () => {
    it("should record oversized files without analysing them", async () => {
      config = { ...config, maxFileSize: 10 };
      await writeTree(tempDir, { "big.py": "def big():\n    return 1\n" });
      const extraction = engine();
      await extraction.runStructurePass(project);
      const result = await extraction.runContentPass(project);

      expect(result.skipped).toBe(1);
      const reports = await listReports(store, "p1", "SkippedFile");
      expect(reports[0]?.details).toEqual({ size: 24, limit: 10 });
    });
  });

  describe("inference", () => {
    it("should take a class kind from inference when syntax has no evidence", async () => {
      await writeTree(tempDir, { "repo.py": "class UserRepo:\n    pass\n" });
      const inference = new FakeInference({
        inferFields: (request) => ({
          fields: Object.fromEntries(request.fields.map((field) => [field, "repository"])),
        }),
      });
      const extraction = engine(inference);
      await extraction.runStructurePass(project);
      await extraction.runContentPass(project);

      const classes = await nodes("Class");
      expect(classes[0]?.properties.type).toBe("repository");
      expect(classes[0]?.properties.provenance).toMatchObject({ name: "syntax", type: "inference" });
      expect(inference.callsTo("inferFields")).toMatchObject([{ filePath: "repo.py", fields: ["class:UserRepo:kind"] }]);
    });

    it("should keep the syntactic kind and record a disagreement", async () => {
      await writeTree(tempDir, { "main.py": MAIN_PY, "utils.py": UTILS_PY });
      const inference = new FakeInference({ inferFields: () => ({ fields: { "class:DataProcessor:kind": "plain" } }) });
      const extraction = engine(inference);
      await extraction.runStructurePass(project);
      await extraction.runContentPass(project);

      const classes = await nodes("Class");
      expect(classes[0]?.properties.type).toBe("singleton");
      expect(classes[0]?.properties.conflicts).toEqual([
        { field: "type", syntax: "singleton", inference: "plain", winner: "syntax" },
      ]);
    });

    it("should fall back to defaults and leave feedback when inference is down", async () => {
      await writeTree(tempDir, { "repo.py": "class UserRepo:\n    pass\n" });
      const extraction = engine(new FakeInference());
      await extraction.runStructurePass(project);
      const result = await extraction.runContentPass(project);

      expect(result).toMatchObject({ parsed: 1, inferenceFailures: 1 });
      const classes = await nodes("Class");
      expect(classes[0]?.properties.type).toBe("plain");

      const feedback = await listFeedback(store, "p1", "TransientInferenceError");
      expect(feedback.map((entry) => entry.id)).toEqual(["feedback:TransientInferenceError:inferFields:repo.py"]);
      expect(feedback[0]?.details).toMatchObject({ fields: ["class:UserRepo:kind"], model: "fake-model" });
    });

    it("should build files without a grammar from whole-file inference", async () => {
      await writeTree(tempDir, { "billing.rb": "def charge(amount)\n  amount\nend\n" });
      const inference = new FakeInference({
        inferSkeleton: () => ({
          functions: [
            {
              name: "charge",
              return_type: null,
              arguments: [{ name: "amount", type: "Integer" }],
              decorators: [],
              is_static: false,
              is_async: false,
              docstring: null,
            },
          ],
          classes: [],
          enums: [],
          imports: [],
        }),
      });
      const extraction = engine(inference);
      await extraction.runStructurePass(project);
      const result = await extraction.runContentPass(project);

      expect(result.inferred).toBe(1);
      const { rows } = await store.query({ kind: "nodes", projectId: "p1", label: "Function" });
      expect(rows[0]?.properties).toMatchObject({
        name: "charge",
        return_type: "Any",
        arguments: [{ name: "amount", type: "Integer" }],
        provenance: { name: "inference", return_type: "default", arguments: "inference" },
      });
      const file = await store.query({ kind: "nodes", projectId: "p1", label: "File" });
      expect(file.rows[0]?.properties).toMatchObject({ parse_status: "inferred", truncated: false });
    });

    it("should skip files without a grammar when no inference is configured", async () => {
      await writeTree(tempDir, { "billing.rb": "def charge(amount)\n  amount\nend\n" });
      const extraction = engine();
      await extraction.runStructurePass(project);
      const result = await extraction.runContentPass(project);

      expect(result.skipped).toBe(1);
      const { rows } = await store.query({ kind: "nodes", projectId: "p1", label: "File", where: { path: "billing.rb" } });
      expect(rows[0]?.properties.parse_status).toBe("skipped");
    });
  });
});
