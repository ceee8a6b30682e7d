import { describe, it, expect, beforeEach } from "vitest";
import { buildActions, StrategyScheduler } from "../strategy-scheduler.js";
import { MappingGenerator } from "../mapping-generator.js";
import { MemoryGraphStore } from "../../graph/memory-graph-store.js";
import { nodeRef } from "../../graph/graph-access.js";
import type { ComponentEntity, MappingEntity } from "../../../types/entities.js";
import { makeProject, seedComponent, seedFiles } from "../../../test-utils/fixtures.js";

function component(type: ComponentEntity["type"]): ComponentEntity {
  return { id: "component:models.py", file_path: "models.py", type, signals: [], provenance: "syntax" };
}

function mapping(overrides: Partial<MappingEntity>): MappingEntity {
  return {
    id: "mapping:component:models.py",
    source_ref: "component:models.py",
    target_ref: "target:data:TypeScript data model",
    file_path: "models.py",
    construct: null,
    data_type_mapping: {},
    is_custom: false,
    unresolved: [],
    provenance: "syntax",
    ...overrides,
  };
}

describe("buildActions", () => {
  const targetNames = new Map([
    ["target:data:TypeScript data model", "TypeScript data model"],
    ["target:singleton:module-scoped instance", "module-scoped instance"],
  ]);

  it("should list the component, construct, type and unresolved actions in order", () => {
    const actions = buildActions({
      component: component("data"),
      componentMapping: mapping({ data_type_mapping: { int: "number", str: "string" }, unresolved: ["Frame"] }),
      constructMappings: [
        mapping({
          id: "mapping:models.py#class:Registry",
          source_ref: "models.py#class:Registry",
          target_ref: "target:singleton:module-scoped instance",
          construct: "singleton",
        }),
      ],
      targetNames,
      cycle: undefined,
    });

    expect(actions).toEqual([
      "Port data model to TypeScript data model",
      "Replace singleton Registry with module-scoped instance",
      "Apply data type mapping (2 types)",
      "Resolve unmapped construct: Frame",
    ]);
  });

  it("should lead with the cycle review and handle unknown components", () => {
    const actions = buildActions({
      component: component("unknown"),
      componentMapping: mapping({ data_type_mapping: { int: "number" } }),
      constructMappings: [],
      targetNames,
      cycle: { members: ["a.py", "models.py"], brokenEdges: [["a.py", "models.py"]] },
    });

    expect(actions).toEqual([
      "Review dependency cycle: a.py, models.py",
      "Review manually: component type unknown",
      "Apply data type mapping (1 type)",
    ]);
  });
});

describe("StrategyScheduler", () => {
  let store: MemoryGraphStore;

  beforeEach(async () => {
    store = new MemoryGraphStore();
    await store.initialize();
    const project = makeProject("p1", "/src");
    await seedFiles(store, project, ["a.py", "b.py", "c.py", "README.md"], [
      ["a.py", "b.py"],
      ["b.py", "a.py"],
      ["c.py", "a.py"],
    ]);
    await seedComponent(store, "p1", "a.py", "logic");
    await seedComponent(store, "p1", "b.py", "data");
    await seedComponent(store, "p1", "c.py", "ui");
    await new MappingGenerator(store, null).generate(project);
  });

  it("should give every component exactly one place in a total order", async () => {
    const result = await new StrategyScheduler(store, 3).schedule("p1");

    expect(result.order).toEqual(["a.py", "b.py", "c.py"]);
    expect(result.strategies.map((strategy) => [strategy.file_path, strategy.priority])).toEqual([
      ["a.py", 1],
      ["b.py", 2],
      ["c.py", 3],
    ]);
    expect(result.cycles).toEqual([{ members: ["a.py", "b.py"], brokenEdges: [["a.py", "b.py"]] }]);
  });

  it("should record dependencies left after breaking cycles and the actions", async () => {
    const { strategies } = await new StrategyScheduler(store, 3).schedule("p1");

    expect(strategies).toEqual([
      {
        id: "strategy:a.py",
        component_ref: "component:a.py",
        file_path: "a.py",
        priority: 1,
        actions: ["Review dependency cycle: a.py, b.py", "Port logic to TypeScript module"],
        depends_on: [],
      },
      {
        id: "strategy:b.py",
        component_ref: "component:b.py",
        file_path: "b.py",
        priority: 2,
        actions: ["Review dependency cycle: a.py, b.py", "Port data model to TypeScript data model"],
        depends_on: ["a.py"],
      },
      {
        id: "strategy:c.py",
        component_ref: "component:c.py",
        file_path: "c.py",
        priority: 3,
        actions: ["Rebuild view as React component"],
        depends_on: ["a.py"],
      },
    ]);
  });

  it("should attach each strategy to its component", async () => {
    await new StrategyScheduler(store, 3).schedule("p1");
    await new StrategyScheduler(store, 3).schedule("p1");

    const { rows } = await store.query({ kind: "edges", projectId: "p1", types: ["PLANNED_IN"] });
    expect(rows.map((edge) => `${edge.from.key}->${edge.to.key}`).sort()).toEqual([
      "component:a.py->strategy:a.py",
      "component:b.py->strategy:b.py",
      "component:c.py->strategy:c.py",
    ]);
  });

  it("should retire the strategy of a component that is gone and renumber the rest", async () => {
    await new StrategyScheduler(store, 3).schedule("p1");
    await store.upsertNode(nodeRef("p1", "Component", "component:a.py"), { stale: true });

    const result = await new StrategyScheduler(store, 3).schedule("p1");

    expect(result.strategies.map((strategy) => [strategy.file_path, strategy.priority])).toEqual([
      ["b.py", 1],
      ["c.py", 2],
    ]);
    const { rows } = await store.query({ kind: "nodes", projectId: "p1", label: "Strategy" });
    expect(rows.map((row) => [row.properties.file_path, row.properties.priority, row.properties.stale])).toEqual([
      ["a.py", 1, true],
      ["b.py", 1, false],
      ["c.py", 2, false],
    ]);
  });
});
