/**
 * MemoryGraphStore Tests
 *
 * Upsert semantics, transaction atomicity and the endpoint rules every
 * IGraphStore enforces.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MemoryGraphStore } from "../memory-graph-store.js";
import { ConstraintViolationError, ErrorCode, TransientStoreError } from "../../errors.js";
import { fileRef, nodeRef, projectRef } from "../graph-access.js";

describe("MemoryGraphStore", () => {
  let store: MemoryGraphStore;

  beforeEach(async () => {
    store = new MemoryGraphStore();
    await store.initialize();
    await store.transaction(async (tx) => {
      await tx.upsertNode(projectRef("p1"), { id: "p1", name: "demo" });
      await tx.upsertNode(fileRef("p1", "main.py"), { path: "main.py", size: 10 });
      await tx.upsertNode(fileRef("p1", "utils.py"), { path: "utils.py", size: 20 });
    });
  });

  describe("Lifecycle", () => {
    it("should report isReady after initialization", () => {
      expect(store.isReady).toBe(true);
    });

    it("should reject reads before initialization", async () => {
      const fresh = new MemoryGraphStore();
      await expect(fresh.query({ kind: "nodes", projectId: "p1" })).rejects.toBeInstanceOf(TransientStoreError);
    });
  });

  describe("upsertNode", () => {
    it("should merge properties into an existing node", async () => {
      await store.upsertNode(fileRef("p1", "main.py"), { language: "python", size: 11 });

      const { rows } = await store.query({ kind: "nodes", projectId: "p1", label: "File", where: { path: "main.py" } });
      expect(rows).toHaveLength(1);
      expect(rows[0]?.properties).toEqual({ path: "main.py", size: 11, language: "python", project_id: "p1" });
    });

    it("should keep properties no schema names", async () => {
      await store.upsertNode(fileRef("p1", "main.py"), { cobol_division: { name: "PROCEDURE", lines: [1, 2] } });

      const { rows } = await store.query({ kind: "nodes", projectId: "p1", where: { path: "main.py" } });
      expect(rows[0]?.properties.cobol_division).toEqual({ name: "PROCEDURE", lines: [1, 2] });
    });

    it("should not create duplicates when the same key is written twice", async () => {
      await store.upsertNode(fileRef("p1", "main.py"), { path: "main.py", size: 10 });

      const { rows } = await store.query({ kind: "nodes", projectId: "p1", label: "File" });
      expect(rows.map((row) => row.key).sort()).toEqual(["main.py", "utils.py"]);
    });

    it("should reject an empty natural key", async () => {
      await expect(store.upsertNode(fileRef("p1", ""), {})).rejects.toBeInstanceOf(ConstraintViolationError);
    });
  });

  describe("upsertEdge", () => {
    it("should create an edge once and merge its properties", async () => {
      await store.upsertEdge("IMPORTS", fileRef("p1", "main.py"), fileRef("p1", "utils.py"), { module: "utils" });
      await store.upsertEdge("IMPORTS", fileRef("p1", "main.py"), fileRef("p1", "utils.py"), { line: 1 });

      const { rows } = await store.query({ kind: "edges", projectId: "p1", types: ["IMPORTS"] });
      expect(rows).toHaveLength(1);
      expect(rows[0]?.properties).toEqual({ module: "utils", line: 1 });
    });

    it("should reject an edge whose endpoint does not exist", async () => {
      const error = await store
        .upsertEdge("IMPORTS", fileRef("p1", "main.py"), fileRef("p1", "missing.py"))
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ConstraintViolationError);
      expect(error).toMatchObject({ code: ErrorCode.STORE_MISSING_ENDPOINT });
    });

    it("should reject an edge across projects", async () => {
      await store.upsertNode(fileRef("p2", "other.py"), { path: "other.py" });

      const error = await store
        .upsertEdge("IMPORTS", fileRef("p1", "main.py"), fileRef("p2", "other.py"))
        .catch((caught: unknown) => caught);
      expect(error).toMatchObject({ code: ErrorCode.STORE_CROSS_PROJECT_EDGE });
    });

    it("should reject labels the relationship type does not connect", async () => {
      await expect(store.upsertEdge("IMPORTS", projectRef("p1"), fileRef("p1", "main.py"))).rejects.toBeInstanceOf(
        ConstraintViolationError
      );
    });

    it("should keep at most one CLASSIFIES_AS edge per file", async () => {
      const logic = nodeRef("p1", "Component", "component:main.py#logic");
      const ui = nodeRef("p1", "Component", "component:main.py#ui");
      await store.transaction(async (tx) => {
        await tx.upsertNode(logic, { type: "logic" });
        await tx.upsertNode(ui, { type: "ui" });
      });

      await store.upsertEdge("CLASSIFIES_AS", fileRef("p1", "main.py"), logic);
      await store.upsertEdge("CLASSIFIES_AS", fileRef("p1", "main.py"), ui);

      const { rows } = await store.query({ kind: "edges", projectId: "p1", types: ["CLASSIFIES_AS"] });
      expect(rows.map((row) => row.to.key)).toEqual(["component:main.py#ui"]);
    });
  });

  describe("transaction", () => {
    it("should apply nothing when a staged edge is invalid", async () => {
      await expect(
        store.transaction(async (tx) => {
          await tx.upsertNode(fileRef("p1", "new.py"), { path: "new.py" });
          await tx.upsertEdge("IMPORTS", fileRef("p1", "new.py"), fileRef("p1", "missing.py"));
        })
      ).rejects.toBeInstanceOf(ConstraintViolationError);

      const { rows } = await store.query({ kind: "nodes", projectId: "p1", where: { path: "new.py" } });
      expect(rows).toHaveLength(0);
    });

    it("should apply nothing when the transaction function throws", async () => {
      await expect(
        store.transaction(async (tx) => {
          await tx.upsertNode(fileRef("p1", "new.py"), { path: "new.py" });
          throw new Error("abort");
        })
      ).rejects.toThrow("abort");

      const { rows } = await store.query({ kind: "nodes", projectId: "p1", where: { path: "new.py" } });
      expect(rows).toHaveLength(0);
    });

    it("should accept an edge to a node staged earlier in the same transaction", async () => {
      await store.transaction(async (tx) => {
        await tx.upsertNode(fileRef("p1", "new.py"), { path: "new.py" });
        await tx.upsertEdge("CONTAINS", projectRef("p1"), fileRef("p1", "new.py"));
      });

      const { rows } = await store.query({ kind: "edges", projectId: "p1", types: ["CONTAINS"] });
      expect(rows.map((row) => row.to.key)).toEqual(["new.py"]);
    });

    it("should return the transaction function's value", async () => {
      const value = await store.transaction(async () => 42);
      expect(value).toBe(42);
    });
  });

  describe("traverse", () => {
    beforeEach(async () => {
      await store.transaction(async (tx) => {
        await tx.upsertNode(fileRef("p1", "c.py"), { path: "c.py" });
        await tx.upsertEdge("IMPORTS", fileRef("p1", "main.py"), fileRef("p1", "utils.py"));
        await tx.upsertEdge("IMPORTS", fileRef("p1", "utils.py"), fileRef("p1", "c.py"));
        await tx.upsertEdge("REFERENCES", fileRef("p1", "c.py"), fileRef("p1", "main.py"));
      });
    });

    it("should return shortest hop counts and terminate on cycles", async () => {
      const { rows } = await store.query({
        kind: "traverse",
        start: fileRef("p1", "main.py"),
        types: ["IMPORTS", "REFERENCES"],
      });

      expect(rows.map((row) => [row.node.key, row.hops])).toEqual([
        ["utils.py", 1],
        ["c.py", 2],
      ]);
    });

    it("should stop at maxHops", async () => {
      const { rows } = await store.query({
        kind: "traverse",
        start: fileRef("p1", "main.py"),
        types: ["IMPORTS"],
        maxHops: 1,
      });
      expect(rows.map((row) => row.node.key)).toEqual(["utils.py"]);
    });

    it("should follow edges backwards when direction is in", async () => {
      const { rows } = await store.query({
        kind: "traverse",
        start: fileRef("p1", "c.py"),
        types: ["IMPORTS"],
        direction: "in",
      });
      expect(rows.map((row) => [row.node.key, row.hops])).toEqual([
        ["utils.py", 1],
        ["main.py", 2],
      ]);
    });
  });

  describe("projects", () => {
    it("should list project ids and purge one project only", async () => {
      await store.transaction(async (tx) => {
        await tx.upsertNode(projectRef("p2"), { id: "p2" });
        await tx.upsertNode(fileRef("p2", "other.py"), { path: "other.py" });
      });
      expect(await store.listProjectIds()).toEqual(["p1", "p2"]);

      const removed = await store.purgeProject("p2");

      expect(removed).toBe(2);
      expect(await store.listProjectIds()).toEqual(["p1"]);
      const { rows } = await store.query({ kind: "nodes", projectId: "p1" });
      expect(rows).toHaveLength(3);
    });
  });
});
