import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { MemoryGraphStore } from "../../graph/memory-graph-store.js";
import { fileRef, projectRef } from "../../graph/graph-access.js";
import { ConfigurationError } from "../../errors.js";
import { csvField, exportSnapshot, importSnapshot, parseSnapshot, toCsv, writeSnapshot } from "../graph-export.js";
import { makeTempDir, removeTempDir } from "../../../test-utils/fixtures.js";

const NOW = new Date("2024-06-01T00:00:00.000Z");

describe("graph export", () => {
  let store: MemoryGraphStore;

  beforeEach(async () => {
    store = new MemoryGraphStore();
    await store.initialize();
    await store.transaction(async (tx) => {
      await tx.upsertNode(projectRef("p1"), { id: "p1", name: "demo" });
      await tx.upsertNode(fileRef("p1", "utils.py"), { path: "utils.py" });
      await tx.upsertNode(fileRef("p1", "main.py"), { path: "main.py" });
      await tx.upsertEdge("CONTAINS", projectRef("p1"), fileRef("p1", "utils.py"));
      await tx.upsertEdge("CONTAINS", projectRef("p1"), fileRef("p1", "main.py"));
      await tx.upsertEdge("IMPORTS", fileRef("p1", "main.py"), fileRef("p1", "utils.py"), { module: "utils" });
    });
  });

  describe("exportSnapshot", () => {
    it("should sort nodes and edges and drop store-managed properties", async () => {
      const snapshot = await exportSnapshot(store, "p1", {}, NOW);

      expect(snapshot).toEqual({
        schema_version: 1,
        project_id: "p1",
        exported_at: "2024-06-01T00:00:00.000Z",
        nodes: [
          { label: "File", key: "main.py", properties: { path: "main.py" } },
          { label: "File", key: "utils.py", properties: { path: "utils.py" } },
          { label: "Project", key: "p1", properties: { id: "p1", name: "demo" } },
        ],
        edges: [
          { type: "CONTAINS", from: { label: "Project", key: "p1" }, to: { label: "File", key: "main.py" }, properties: {} },
          { type: "CONTAINS", from: { label: "Project", key: "p1" }, to: { label: "File", key: "utils.py" }, properties: {} },
          {
            type: "IMPORTS",
            from: { label: "File", key: "main.py" },
            to: { label: "File", key: "utils.py" },
            properties: { module: "utils" },
          },
        ],
      });
    });

    it("should keep only edges whose endpoints pass the label filter", async () => {
      const snapshot = await exportSnapshot(store, "p1", { labels: ["File"] }, NOW);

      expect(snapshot.nodes.map((node) => node.key)).toEqual(["main.py", "utils.py"]);
      expect(snapshot.edges.map((edge) => edge.type)).toEqual(["IMPORTS"]);
    });

    it("should leave stale nodes and their edges out unless asked", async () => {
      await store.upsertNode(fileRef("p1", "utils.py"), { stale: true });

      const current = await exportSnapshot(store, "p1", {}, NOW);
      const full = await exportSnapshot(store, "p1", { includeStale: true }, NOW);

      expect(current.nodes.map((node) => node.key)).toEqual(["main.py", "p1"]);
      expect(current.edges.map((edge) => `${edge.type}:${edge.to.key}`)).toEqual(["CONTAINS:main.py"]);
      expect(full.nodes.map((node) => node.key)).toEqual(["main.py", "utils.py", "p1"]);
      expect(full.edges).toHaveLength(3);
    });
  });

  describe("CSV", () => {
    it("should quote fields holding commas or quotes", () => {
      expect(csvField("main.py")).toBe("main.py");
      expect(csvField("a,b")).toBe('"a,b"');
      expect(csvField('say "hi"')).toBe('"say ""hi"""');
    });

    it("should write one line per node and edge under a header", async () => {
      const csv = toCsv(await exportSnapshot(store, "p1", {}, NOW));

      expect(csv.nodes.split("\n")).toEqual([
        "label,key,properties",
        'File,main.py,"{""path"":""main.py""}"',
        'File,utils.py,"{""path"":""utils.py""}"',
        'Project,p1,"{""id"":""p1"",""name"":""demo""}"',
        "",
      ]);
      expect(csv.edges.split("\n")).toEqual([
        "type,from_label,from_key,to_label,to_key,properties",
        "CONTAINS,Project,p1,File,main.py,{}",
        "CONTAINS,Project,p1,File,utils.py,{}",
        'IMPORTS,File,main.py,File,utils.py,"{""module"":""utils""}"',
        "",
      ]);
    });
  });

  describe("files", () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await makeTempDir("graph-export-test");
    });

    afterEach(async () => {
      await removeTempDir(tempDir);
    });

    it("should write a JSON snapshot that parses back unchanged", async () => {
      const snapshot = await exportSnapshot(store, "p1", {}, NOW);
      const target = path.join(tempDir, "out", "graph.json");

      expect(await writeSnapshot(snapshot, target, "json")).toEqual([target]);
      const reread = parseSnapshot(JSON.parse(await fs.readFile(target, "utf-8")));
      expect(reread).toEqual(snapshot);
    });

    it("should write nodes.csv and edges.csv into a directory", async () => {
      const snapshot = await exportSnapshot(store, "p1", {}, NOW);

      const written = await writeSnapshot(snapshot, tempDir, "csv");

      expect(written).toEqual([path.join(tempDir, "nodes.csv"), path.join(tempDir, "edges.csv")]);
      const nodes = await fs.readFile(path.join(tempDir, "nodes.csv"), "utf-8");
      expect(nodes.split("\n")[0]).toBe("label,key,properties");
    });
  });

  describe("parseSnapshot", () => {
    it("should reject documents that are not snapshots", () => {
      expect(() => parseSnapshot({ nodes: [] })).toThrow(ConfigurationError);
      expect(() => parseSnapshot({ nodes: [] })).toThrow("Not a graph snapshot");
    });

    it("should reject snapshots of another schema version", async () => {
      const snapshot = await exportSnapshot(store, "p1", {}, NOW);

      expect(() => parseSnapshot({ ...snapshot, schema_version: 2 })).toThrow(
        "Snapshot schema version 2 does not match 1"
      );
    });
  });

  describe("importSnapshot", () => {
    it("should restore a snapshot under another project id", async () => {
      const snapshot = await exportSnapshot(store, "p1", {}, NOW);
      const target = new MemoryGraphStore();
      await target.initialize();

      expect(await importSnapshot(target, snapshot, "p2")).toEqual({ nodes: 3, edges: 3 });
      await importSnapshot(target, snapshot, "p2");

      const restored = await exportSnapshot(target, "p2", {}, NOW);
      expect(restored.nodes).toHaveLength(3);
      expect(restored.nodes[2]).toEqual({ label: "Project", key: "p2", properties: { id: "p2", name: "demo" } });
      expect(restored.edges.map((edge) => `${edge.type}:${edge.from.key}>${edge.to.key}`)).toEqual([
        "CONTAINS:p2>main.py",
        "CONTAINS:p2>utils.py",
        "IMPORTS:main.py>utils.py",
      ]);
      await target.close();
    });
  });
});
