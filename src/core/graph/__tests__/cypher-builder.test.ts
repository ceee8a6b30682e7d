/**
 * Cypher builder and property codec: the pure parts of the Neo4j store.
 */

import { describe, it, expect } from "vitest";
import {
  buildEdgeQuery,
  buildListProjects,
  buildNodeQuery,
  buildSchemaStatements,
  buildRemoveEdge,
  buildTraversalStep,
  buildUpsertEdge,
  buildUpsertNode,
} from "../cypher-builder.js";
import { JSON_TAG, decodeProperties, decodeValue, encodeProperties, encodeValue } from "../property-codec.js";
import { ConstraintViolationError } from "../../errors.js";
import { fileRef, nodeRef } from "../graph-access.js";

describe("property codec", () => {
  it("should store scalars and homogeneous lists as they are", () => {
    expect(encodeValue("main.py")).toBe("main.py");
    expect(encodeValue(3)).toBe(3);
    expect(encodeValue(false)).toBe(false);
    expect(encodeValue(["@staticmethod", "@property"])).toEqual(["@staticmethod", "@property"]);
  });

  it("should tag values Neo4j cannot hold natively", () => {
    expect(encodeValue(null)).toBe(`${JSON_TAG}null`);
    expect(encodeValue([])).toBe(`${JSON_TAG}[]`);
    expect(encodeValue({ List: "Array" })).toBe(`${JSON_TAG}{"List":"Array"}`);
    expect(encodeValue([{ name: "args", type: "list" }])).toBe(`${JSON_TAG}[{"name":"args","type":"list"}]`);
  });

  it("should restore an open property bag exactly", () => {
    const bag = {
      name: "main",
      arguments: [{ name: "args", type: "list" }],
      provenance: { name: "syntax" },
      docstring: null,
      tags: [],
      tricky: `${JSON_TAG}not json`,
    };
    expect(decodeProperties(encodeProperties(bag))).toEqual(bag);
  });

  it("should decode plain values unchanged", () => {
    expect(decodeValue("plain")).toBe("plain");
    expect(decodeValue([1, 2])).toEqual([1, 2]);
  });
});

describe("cypher builder", () => {
  it("should create one constraint and one index per label", () => {
    const statements = buildSchemaStatements(["File"]);
    expect(statements).toEqual([
      "CREATE CONSTRAINT `File_uid` IF NOT EXISTS FOR (n:`File`) REQUIRE n._uid IS UNIQUE",
      "CREATE INDEX `File_project` IF NOT EXISTS FOR (n:`File`) ON (n.project_id)",
    ]);
  });

  it("should merge nodes on their uid", () => {
    const query = buildUpsertNode(fileRef("p1", "main.py"), { size: 10 });
    expect(query.text).toBe(
      "MERGE (n:`File` {_uid: $uid}) ON CREATE SET n._key = $key SET n += $props, n.project_id = $projectId"
    );
    expect(query.params).toEqual({ uid: "p1::File::main.py", key: "main.py", projectId: "p1", props: { size: 10 } });
  });

  it("should drop other outgoing edges for functional types only", () => {
    const component = nodeRef("p1", "Component", "component:main.py");
    const functional = buildUpsertEdge("CLASSIFIES_AS", fileRef("p1", "main.py"), component, {});
    const plain = buildUpsertEdge("IMPORTS", fileRef("p1", "main.py"), fileRef("p1", "utils.py"), {});

    expect(functional.text).toContain("FOREACH (r IN replaced | DELETE r)");
    expect(plain.text).not.toContain("DELETE");
    expect(plain.params).toEqual({ from: "p1::File::main.py", to: "p1::File::utils.py", props: {} });
  });

  it("should filter nodes by encoded property values", () => {
    const query = buildNodeQuery({ kind: "nodes", projectId: "p1", label: "File", where: { path: "a.py", stale: null } });
    expect(query.text).toBe(
      "MATCH (n:`File`) WHERE n.project_id = $projectId AND n.`path` = $w0 AND (n.`stale` IS NULL OR n.`stale` = $w1) RETURN n ORDER BY n._key"
    );
    expect(query.params).toEqual({ projectId: "p1", w0: "a.py", w1: `${JSON_TAG}null` });
  });

  it("should refuse property names that are not identifiers", () => {
    expect(() => buildNodeQuery({ kind: "nodes", projectId: "p1", where: { "x` OR 1=1 //": 1 } })).toThrow(
      ConstraintViolationError
    );
  });

  it("should narrow edges by type and endpoint", () => {
    const query = buildEdgeQuery({ kind: "edges", projectId: "p1", types: ["IMPORTS"], from: fileRef("p1", "a.py") });
    expect(query.params).toEqual({ projectId: "p1", types: ["IMPORTS"], from: "p1::File::a.py" });
    expect(query.text.startsWith("MATCH (a)-[r]->(b) WHERE a.project_id = $projectId AND type(r) IN $types AND a._uid = $from")).toBe(
      true
    );
  });

  it("should expand one hop from the frontier without variable-length paths", () => {
    const step = buildTraversalStep(
      { kind: "traverse", start: fileRef("p1", "a.py"), types: ["IMPORTS", "REFERENCES"] },
      ["p1::File::a.py"],
      ["p1::File::a.py"]
    );
    const incoming = buildTraversalStep(
      { kind: "traverse", start: fileRef("p1", "a.py"), types: ["IMPORTS"], direction: "in" },
      ["p1::File::a.py"],
      ["p1::File::a.py", "p1::File::b.py"]
    );

    expect(step.text).toBe(
      "MATCH (s)-[:`IMPORTS`|`REFERENCES`]->(n) WHERE s._uid IN $frontier AND NOT n._uid IN $visited RETURN DISTINCT n ORDER BY n._key"
    );
    expect(step.text).not.toContain("*");
    expect(incoming.text.startsWith("MATCH (s)<-[:`IMPORTS`]-(n)")).toBe(true);
    expect(incoming.params).toEqual({ frontier: ["p1::File::a.py"], visited: ["p1::File::a.py", "p1::File::b.py"] });
  });

  it("should delete a single edge by its endpoints", () => {
    const query = buildRemoveEdge("IMPORTS", fileRef("p1", "a.py"), fileRef("p1", "b.py"));
    expect(query.text).toBe("MATCH (a:`File` {_uid: $from})-[r:`IMPORTS`]->(b:`File` {_uid: $to}) DELETE r");
    expect(query.params).toEqual({ from: "p1::File::a.py", to: "p1::File::b.py" });
  });

  it("should list projects by key", () => {
    expect(buildListProjects().text).toBe("MATCH (n:`Project`) RETURN n._key AS key ORDER BY key");
  });
});
