import { describe, it, expect } from "vitest";
import { buildFileEntities, skeletonFromInference } from "../entity-builder.js";
import { ProvenanceTracker, mergeField } from "../provenance.js";
import { skeletonClass, skeletonFunction, skeletonOf } from "../../../test-utils/fixtures.js";

describe("mergeField", () => {
  it("should prefer syntax and record a disagreeing inference answer", () => {
    expect(mergeField("type", "singleton", "plain", "plain")).toEqual({
      value: "singleton",
      provenance: "syntax",
      conflict: { field: "type", syntax: "singleton", inference: "plain", winner: "syntax" },
    });
    expect(mergeField("type", "singleton", "singleton", "plain").conflict).toBeNull();
  });

  it("should fall through to inference, then the fallback", () => {
    expect(mergeField("type", null, "service", "plain")).toEqual({ value: "service", provenance: "inference", conflict: null });
    expect(mergeField("type", null, undefined, "plain")).toEqual({ value: "plain", provenance: "default", conflict: null });
  });
});

describe("ProvenanceTracker", () => {
  it("should treat an inferred skeleton's values as inference answers", () => {
    const tracker = new ProvenanceTracker("inference");

    expect(tracker.merge("type", "service", "plain", "plain")).toBe("service");
    expect(tracker.set("name", "Billing")).toBe("Billing");
    expect(tracker.provenance).toEqual({ type: "inference", name: "inference" });
    expect(tracker.conflicts).toEqual([]);
  });
});

describe("buildFileEntities", () => {
  it("should build a function record with unknown types filled in", () => {
    const skeleton = skeletonOf({
      functions: [
        skeletonFunction("load", {
          arguments: [
            { name: "path", type: "str" },
            { name: "mode", type: null },
          ],
          decorators: ["@cache.memoize"],
          docstring: "Load.",
        }),
      ],
    });

    const { nodes } = buildFileEntities("svc.py", skeleton, "syntax", { "decorator:@cache.memoize": "caches results" });

    expect(nodes).toEqual([
      {
        label: "Function",
        key: "svc.py#fn:load",
        properties: {
          id: "svc.py#fn:load",
          name: "load",
          file_path: "svc.py",
          return_type: "Any",
          arguments: [
            { name: "path", type: "str" },
            { name: "mode", type: "Any" },
          ],
          decorators: ["@cache.memoize"],
          is_static: true,
          is_async: false,
          docstring: "Load.",
          line_start: 1,
          line_end: 2,
          provenance: {
            name: "syntax",
            return_type: "default",
            decorators: "syntax",
            is_async: "syntax",
            docstring: "syntax",
            arguments: "default",
            decorator_semantics: "inference",
          },
          stale: false,
          decorator_semantics: { "@cache.memoize": "caches results" },
        },
      },
    ]);
  });

  it("should split interface markers from superclasses and take the inferred kind", () => {
    const skeleton = skeletonOf({
      classes: [
        skeletonClass("Repo", {
          superclasses: ["Base", "abc.ABC"],
          methods: [skeletonFunction("get", { decorators: ["@property"], returnType: "User" })],
          attributes: [{ name: "_db", type: null, visibility: "protected" }],
        }),
      ],
    });

    const { nodes, conflicts } = buildFileEntities("repo.py", skeleton, "syntax", { "class:Repo:kind": "repository" });

    expect(conflicts).toEqual([]);
    expect(nodes[0]?.properties).toMatchObject({
      id: "repo.py#class:Repo",
      type: "repository",
      superclasses: ["Base"],
      interfaces: ["abc.ABC"],
      methods: [{ name: "get", return_type: "User", arguments: [], decorators: ["@property"], is_static: false, is_async: false }],
      attributes: [{ name: "_db", type: "Any", visibility: "protected" }],
      decorator_semantics: {},
      provenance: { name: "syntax", type: "inference", docstring: "default", methods: "syntax" },
    });
  });

  it("should keep one record per declared name", () => {
    const skeleton = skeletonOf({
      functions: [skeletonFunction("f"), skeletonFunction("f", { lineStart: 5, lineEnd: 6 })],
    });

    const { nodes } = buildFileEntities("dup.py", skeleton, "syntax");

    expect(nodes).toHaveLength(1);
    expect(nodes[0]?.properties.line_start).toBe(5);
  });

  it("should build enum and extension records", () => {
    const skeleton = skeletonOf({
      enums: [{ name: "Color", values: ["RED"], docstring: null, lineStart: 3 }],
      extensions: [{ baseType: "User", methods: ["full_name"], lineStart: 9 }],
    });

    const { nodes } = buildFileEntities("ext.py", skeleton, "syntax");

    expect(nodes.map((node) => [node.label, node.key])).toEqual([
      ["Enum", "ext.py#enum:Color"],
      ["Extension", "ext.py#ext:User"],
    ]);
    expect(nodes[0]?.properties.provenance).toEqual({ values: "syntax", docstring: "default" });
    expect(nodes[1]?.properties).toMatchObject({ name: "User extension", base_type: "User", methods: ["full_name"], line_start: 9 });
  });
});

describe("skeletonFromInference", () => {
  it("should split leading dots of inferred imports into a level", () => {
    const skeleton = skeletonFromInference(
      {
        functions: [],
        classes: [],
        enums: [],
        imports: ["..billing.tax", "json"],
      },
      "ruby"
    );

    expect(skeleton.language).toBe("ruby");
    expect(skeleton.imports).toEqual([
      { module: "billing.tax", names: [], level: 2, bindings: [], referenced: false, line: 0 },
      { module: "json", names: [], level: 0, bindings: [], referenced: false, line: 0 },
    ]);
  });

  it("should record inferred class kinds with inference provenance", () => {
    const skeleton = skeletonFromInference(
      {
        functions: [],
        classes: [{ name: "Invoice", type: "data", superclasses: [], methods: [], attributes: [], docstring: null }],
        enums: [],
        imports: [],
      },
      "ruby"
    );

    const { nodes } = buildFileEntities("billing.rb", skeleton, "inference");

    expect(nodes[0]?.properties).toMatchObject({
      id: "billing.rb#class:Invoice",
      type: "data",
      line_start: 0,
      provenance: { name: "inference", type: "inference" },
    });
  });
});
