import { describe, it, expect, beforeEach } from "vitest";
import { MappingGenerator, typesUsedBy } from "../mapping-generator.js";
import { MemoryGraphStore } from "../../graph/memory-graph-store.js";
import { nodeRef } from "../../graph/graph-access.js";
import { loadFileSummaries } from "../../analysis/file-summary.js";
import { listFeedback } from "../../audit/audit-trail.js";
import type { ProjectEntity } from "../../../types/entities.js";
import {
  FakeInference,
  makeProject,
  seedComponent,
  seedFiles,
  seedSkeleton,
  skeletonClass,
  skeletonFunction,
  skeletonOf,
} from "../../../test-utils/fixtures.js";

describe("MappingGenerator", () => {
  let store: MemoryGraphStore;

  beforeEach(async () => {
    store = new MemoryGraphStore();
    await store.initialize();
  });

  async function seedProject(project: ProjectEntity): Promise<void> {
    await seedFiles(store, project, ["models.py", "main.py"]);
    await seedSkeleton(
      store,
      project.id,
      "models.py",
      skeletonOf({
        classes: [
          skeletonClass("User", {
            attributes: [
              { name: "id", type: "int", visibility: "public" },
              { name: "created", type: "datetime", visibility: "public" },
            ],
          }),
          skeletonClass("Registry", {
            kind: "singleton",
            methods: [skeletonFunction("get", { returnType: "User" })],
          }),
        ],
      })
    );
    await seedSkeleton(
      store,
      project.id,
      "main.py",
      skeletonOf({
        functions: [skeletonFunction("main", { returnType: "Frame", arguments: [{ name: "args", type: "list" }] })],
      })
    );
    await seedComponent(store, project.id, "models.py", "data");
    await seedComponent(store, project.id, "main.py", "logic");
  }

  it("should list the types a file uses in first-use order", async () => {
    await seedProject(makeProject("p1", "/src"));
    const summaries = await loadFileSummaries(store, "p1");

    expect(summaries.map(typesUsedBy)).toEqual([
      ["int", "datetime", "User"],
      ["Frame", "list"],
    ]);
  });

  it("should map components and legacy constructs", async () => {
    const project = makeProject("p1", "/src");
    await seedProject(project);

    const result = await new MappingGenerator(store, null).generate(project);

    expect(result.mappings).toEqual([
      {
        id: "mapping:component:models.py",
        source_ref: "component:models.py",
        target_ref: "target:data:TypeScript data model",
        file_path: "models.py",
        construct: null,
        data_type_mapping: { int: "number", datetime: "Date", User: "User" },
        is_custom: false,
        unresolved: [],
        provenance: "syntax",
      },
      {
        id: "mapping:models.py#class:Registry",
        source_ref: "models.py#class:Registry",
        target_ref: "target:singleton:module-scoped instance",
        file_path: "models.py",
        construct: "singleton",
        data_type_mapping: {},
        is_custom: false,
        unresolved: [],
        provenance: "syntax",
      },
      {
        id: "mapping:component:main.py",
        source_ref: "component:main.py",
        target_ref: "target:logic:TypeScript module",
        file_path: "main.py",
        construct: null,
        data_type_mapping: { list: "Array<unknown>" },
        is_custom: false,
        unresolved: ["Frame"],
        provenance: "syntax",
      },
    ]);
    expect(result).toMatchObject({ unresolved: 1, customApplied: 0, inferredTypes: 0 });
  });

  it("should link sources, mappings and targets", async () => {
    const project = makeProject("p1", "/src");
    await seedProject(project);
    await new MappingGenerator(store, null).generate(project);

    const { rows: mapsTo } = await store.query({ kind: "edges", projectId: "p1", types: ["MAPS_TO"] });
    expect(mapsTo.map((edge) => `${edge.from.label}:${edge.from.key}`).sort()).toEqual([
      "Class:models.py#class:Registry",
      "Component:component:main.py",
      "Component:component:models.py",
    ]);

    const { rows: targets } = await store.query({
      kind: "edges",
      projectId: "p1",
      types: ["TARGETS"],
      from: nodeRef("p1", "Mapping", "mapping:component:main.py"),
    });
    expect(targets.map((edge) => edge.to.key)).toEqual(["target:logic:TypeScript module"]);
  });

  it("should route unmapped types to feedback", async () => {
    const project = makeProject("p1", "/src");
    await seedProject(project);
    await new MappingGenerator(store, null).generate(project);

    const feedback = await listFeedback(store, "p1", "UnmappableConstructError");
    expect(feedback).toHaveLength(1);
    expect(feedback[0]).toMatchObject({
      id: "feedback:UnmappableConstructError:main.py:Frame",
      issue: "No target type for Frame",
      component: "main.py",
      details: { code: "E5000", construct: "Frame", mapping: "mapping:component:main.py" },
    });
  });

  it("should ask inference for types the tables miss", async () => {
    const project = makeProject("p1", "/src");
    await seedProject(project);
    const inference = new FakeInference({ mapType: () => ({ target_type: "HTMLCanvasElement" }) });

    const result = await new MappingGenerator(store, inference).generate(project);

    expect(result).toMatchObject({ unresolved: 0, inferredTypes: 1 });
    expect(result.mappings[2]).toMatchObject({
      data_type_mapping: { Frame: "HTMLCanvasElement", list: "Array<unknown>" },
      provenance: "inference",
    });
    expect(inference.callsTo("mapType")).toEqual([
      { sourceLanguage: "python", targetLanguage: "typescript", targetFramework: null, typeName: "Frame", filePath: "main.py" },
    ]);
  });

  it("should prefer custom mappings over tables and inference", async () => {
    const project = makeProject("p1", "/src", { custom_mappings: { Frame: "Canvas", int: "bigint" } });
    await seedProject(project);
    const inference = new FakeInference({ mapType: () => ({ target_type: "HTMLCanvasElement" }) });

    const result = await new MappingGenerator(store, inference).generate(project);

    expect(result.customApplied).toBe(2);
    expect(result.mappings[0]?.data_type_mapping.int).toBe("bigint");
    expect(result.mappings[2]?.data_type_mapping.Frame).toBe("Canvas");
    expect(inference.calls).toEqual([]);
  });

  it("should ask inference once per type across files", async () => {
    const project = makeProject("p1", "/src");
    await seedFiles(store, project, ["a.py", "b.py"]);
    for (const filePath of ["a.py", "b.py"]) {
      await seedSkeleton(
        store,
        "p1",
        filePath,
        skeletonOf({ functions: [skeletonFunction("draw", { returnType: "Frame", arguments: [] })] })
      );
      await seedComponent(store, "p1", filePath, "logic");
    }
    const inference = new FakeInference({ mapType: () => ({ target_type: "HTMLCanvasElement" }) });

    await new MappingGenerator(store, inference).generate(project);

    expect(inference.callsTo("mapType")).toHaveLength(1);
  });

  it("should send constructs without a replacement to manual review", async () => {
    const project = makeProject("p1", "/src", { target_language: "kotlin" });
    await seedFiles(store, project, ["ext.py"]);
    await seedSkeleton(
      store,
      "p1",
      "ext.py",
      skeletonOf({ extensions: [{ baseType: "User", methods: ["full_name"], lineStart: 3 }] })
    );
    await seedComponent(store, "p1", "ext.py", "logic");

    const result = await new MappingGenerator(store, null).generate(project);

    expect(result.mappings[1]).toMatchObject({
      id: "mapping:ext.py#ext:User",
      construct: "extension",
      target_ref: "target:manual:Manual review",
      unresolved: ["extension of User"],
    });
    const feedback = await listFeedback(store, "p1");
    expect(feedback.map((entry) => entry.id)).toEqual(["feedback:UnmappableConstructError:ext.py:extension of User"]);
  });

  it("should not duplicate mappings when run again", async () => {
    const project = makeProject("p1", "/src");
    await seedProject(project);
    const generator = new MappingGenerator(store, null);
    await generator.generate(project);
    await generator.generate(project);

    const { rows } = await store.query({ kind: "nodes", projectId: "p1", label: "Mapping" });
    expect(rows).toHaveLength(3);
  });
});
