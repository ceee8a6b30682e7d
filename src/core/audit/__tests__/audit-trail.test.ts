import { describe, it, expect, beforeEach } from "vitest";
import { MemoryGraphStore } from "../../graph/memory-graph-store.js";
import { nodeRef, projectRef } from "../../graph/graph-access.js";
import { listFeedback, listReports, writeFeedback, writeReport } from "../audit-trail.js";

const FIRST = new Date("2024-03-01T00:00:00.000Z");
const SECOND = new Date("2024-03-02T00:00:00.000Z");

describe("audit trail", () => {
  let store: MemoryGraphStore;

  beforeEach(async () => {
    store = new MemoryGraphStore();
    await store.initialize();
    await store.upsertNode(projectRef("p1"), { id: "p1", name: "demo" });
  });

  it("should overwrite a report seen again and keep its first sighting", async () => {
    await store.transaction((tx) =>
      writeReport(tx, "p1", { kind: "MalformedInputError", subject: "broken.py", message: "syntax error" }, FIRST)
    );
    await store.transaction((tx) =>
      writeReport(
        tx,
        "p1",
        { kind: "MalformedInputError", subject: "broken.py", message: "syntax error at line 2", details: { line: 2 } },
        SECOND
      )
    );

    expect(await listReports(store, "p1")).toEqual([
      {
        id: "report:MalformedInputError:broken.py",
        type: "MalformedInputError",
        subject: "broken.py",
        message: "syntax error at line 2",
        details: { line: 2 },
        created_at: "2024-03-01T00:00:00.000Z",
        updated_at: "2024-03-02T00:00:00.000Z",
      },
    ]);
    const { rows } = await store.query({ kind: "edges", projectId: "p1", types: ["REPORTED_IN"] });
    expect(rows.map((row) => row.to.key)).toEqual(["report:MalformedInputError:broken.py"]);
  });

  it("should list reports oldest first and filter by kind", async () => {
    await store.transaction((tx) => writeReport(tx, "p1", { kind: "SkippedFile", subject: "big.py", message: "too large" }, SECOND));
    await store.transaction((tx) =>
      writeReport(tx, "p1", { kind: "DependencyCycle", subject: "a.py|b.py", message: "cycle" }, FIRST)
    );

    expect((await listReports(store, "p1")).map((report) => report.id)).toEqual([
      "report:DependencyCycle:a.py|b.py",
      "report:SkippedFile:big.py",
    ]);
    expect((await listReports(store, "p1", "SkippedFile")).map((report) => report.id)).toEqual(["report:SkippedFile:big.py"]);
  });

  it("should leave a feedback resolution in place when the issue is seen again", async () => {
    const input = { kind: "UnmappableConstructError", subject: "main.py:Frame", issue: "No target type for Frame", component: "main.py" };
    const ref = await store.transaction((tx) => writeFeedback(tx, "p1", input, FIRST));

    const [fresh] = await listFeedback(store, "p1");
    expect(fresh).toEqual({
      id: "feedback:UnmappableConstructError:main.py:Frame",
      kind: "UnmappableConstructError",
      subject: "main.py:Frame",
      issue: "No target type for Frame",
      suggestion: null,
      component: "main.py",
      details: {},
      resolution: null,
      created_at: "2024-03-01T00:00:00.000Z",
      updated_at: "2024-03-01T00:00:00.000Z",
    });

    await store.upsertNode(ref, { resolution: "Use HTMLCanvasElement" });
    await store.transaction((tx) => writeFeedback(tx, "p1", input, SECOND));

    const [seenAgain] = await listFeedback(store, "p1", "UnmappableConstructError");
    expect(seenAgain?.resolution).toBe("Use HTMLCanvasElement");
    expect(seenAgain?.created_at).toBe("2024-03-01T00:00:00.000Z");
    expect(seenAgain?.updated_at).toBe("2024-03-02T00:00:00.000Z");
    expect(ref).toEqual(nodeRef("p1", "Feedback", "feedback:UnmappableConstructError:main.py:Frame"));
  });
});
