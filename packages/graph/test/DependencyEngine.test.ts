import { describe, it, expect } from "vitest";
import type { AssociationView, DependencyChain } from "../src/core/model.js";
import { analyzeSubtree, dependencyChain } from "../src/core/services/DependencyEngine.js";
import { buildGraph } from "../src/core/GraphBuilder.js";
import { paths, sampleGraph } from "./fixtures/model.js";

const edge = (a: AssociationView): string => `${a.from} -> ${a.to}`;

function levelPaths(chain: DependencyChain): string[][] {
  return chain.levels.map((level) => level.entries.map((entry) => entry.element.path));
}

describe("DependencyEngine", () => {
  const graph = sampleGraph();

  describe("analyzeSubtree", () => {
    it("partitions associations touching the subtree", () => {
      const result = analyzeSubtree(graph, "/P/a");
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      const deps = result.value;
      expect(paths(deps.elements)).toEqual(["/P/a", "/P/a/Foo", "/P/a/FooHelper"]);
      expect(deps.internal.map(edge)).toEqual(["/P/a/Foo -> /P/a/FooHelper"]);
      expect(deps.incoming.map(edge)).toEqual(["/P/b/sub/Baz -> /P/a/Foo"]);
      expect(deps.outgoing.map(edge)).toEqual(["/P/a/Foo -> /P/b/Bar", "/P/a/FooHelper -> /P/External/lodash"]);
    });

    it("counts every touching association exactly once", () => {
      const result = analyzeSubtree(graph, "/P/b");
      if (!result.ok) throw result.error;
      const { internal, incoming, outgoing } = result.value;

      const touching = graph.associations.filter(
        (a) => a.from.startsWith("/P/b/") || a.to.startsWith("/P/b/")
      );
      expect(internal.length + incoming.length + outgoing.length).toBe(touching.length);
    });

    it("classifies the whole graph as internal at the root", () => {
      const result = analyzeSubtree(graph, "/P");
      if (!result.ok) throw result.error;
      expect(result.value.internal).toHaveLength(6);
      expect(result.value.incoming).toEqual([]);
      expect(result.value.outgoing).toEqual([]);
    });

    it("drops associations whose outside end is external when asked", () => {
      const result = analyzeSubtree(graph, "/P/b", { includeExternal: false });
      if (!result.ok) throw result.error;

      expect(result.value.includeExternal).toBe(false);
      expect(result.value.internal.map(edge)).toEqual(["/P/b/Bar -> /P/b/sub/Baz"]);
      expect(result.value.incoming.map(edge)).toEqual(["/P/a/Foo -> /P/b/Bar"]);
      expect(result.value.outgoing.map(edge)).toEqual(["/P/b/sub/Baz -> /P/a/Foo"]);
    });

    it("keeps associations into an external subtree from internal sources", () => {
      const result = analyzeSubtree(graph, "/P/External", { includeExternal: false });
      if (!result.ok) throw result.error;
      expect(result.value.incoming.map(edge)).toEqual([
        "/P/a/FooHelper -> /P/External/lodash",
        "/P/b/Bar -> /P/External/lodash",
      ]);
    });

    it("attributes deeper endpoints to their nearest analyzed ancestor", () => {
      const result = analyzeSubtree(graph, "/P/a", { maxDepth: 0 });
      if (!result.ok) throw result.error;
      const deps = result.value;

      expect(paths(deps.elements)).toEqual(["/P/a"]);
      expect(deps.maxDepth).toBe(0);
      expect(deps.internal[0]).toMatchObject({
        from: "/P/a/Foo",
        to: "/P/a/FooHelper",
        attributedFrom: "/P/a",
        attributedTo: "/P/a",
      });
      expect(deps.outgoing[0]).toMatchObject({ from: "/P/a/Foo", attributedFrom: "/P/a", attributedTo: null });
      expect(deps.incoming[0]).toMatchObject({ to: "/P/a/Foo", attributedFrom: null, attributedTo: "/P/a" });
    });

    it("keeps association attributes", () => {
      const result = analyzeSubtree(graph, "/P/External");
      if (!result.ok) throw result.error;
      expect(result.value.incoming[1].attributes).toEqual({ optional: true });
    });

    it("reports an unknown root", () => {
      const result = analyzeSubtree(graph, "/P/nope");
      expect(!result.ok && result.error.message).toBe("Element not found: /P/nope");
    });
  });

  describe("dependencyChain", () => {
    it("walks outgoing associations level by level", () => {
      const result = dependencyChain(graph, "/P/a/Foo", "outgoing");
      if (!result.ok) throw result.error;
      const chain = result.value;

      expect(levelPaths(chain)).toEqual([
        ["/P/a/Foo"],
        ["/P/a/FooHelper", "/P/b/Bar"],
        ["/P/External/lodash", "/P/b/sub/Baz"],
      ]);
      expect(chain.visitedCount).toBe(5);
      expect(chain.truncated).toBe(false);
      expect(chain.maxDepth).toBeNull();
    });

    it("records the association that first reached each element", () => {
      const result = dependencyChain(graph, "/P/a/Foo", "outgoing");
      if (!result.ok) throw result.error;

      const [start, first, second] = result.value.levels;
      expect(start.entries[0].via).toBeNull();
      expect(first.entries.map((e) => e.via?.type)).toEqual(["calls", "uses"]);
      // FooHelper comes before Bar in the frontier, so its edge wins
      expect(second.entries[0].via).toMatchObject({ from: "/P/a/FooHelper", to: "/P/External/lodash" });
    });

    it("walks incoming associations and stops on cycles", () => {
      const result = dependencyChain(graph, "/P/External/lodash", "incoming");
      if (!result.ok) throw result.error;

      expect(levelPaths(result.value)).toEqual([
        ["/P/External/lodash"],
        ["/P/a/FooHelper", "/P/b/Bar"],
        ["/P/a/Foo"],
        ["/P/b/sub/Baz"],
      ]);
      expect(result.value.visitedCount).toBe(5);
    });

    it("stops at maxDepth and says so", () => {
      const result = dependencyChain(graph, "/P/a/Foo", "outgoing", 1);
      if (!result.ok) throw result.error;
      expect(levelPaths(result.value)).toEqual([["/P/a/Foo"], ["/P/a/FooHelper", "/P/b/Bar"]]);
      expect(result.value.truncated).toBe(true);
    });

    it("returns only the start element at depth 0", () => {
      const result = dependencyChain(graph, "/P/a/Foo", "outgoing", 0);
      if (!result.ok) throw result.error;
      expect(levelPaths(result.value)).toEqual([["/P/a/Foo"]]);
      expect(result.value.visitedCount).toBe(1);
      expect(result.value.truncated).toBe(true);
    });

    it("returns a single level for an element without dependencies", () => {
      const result = dependencyChain(graph, "/P/External/lodash", "outgoing");
      if (!result.ok) throw result.error;
      expect(levelPaths(result.value)).toEqual([["/P/External/lodash"]]);
      expect(result.value.truncated).toBe(false);
    });

    it("rejects an unknown direction before resolving the start", () => {
      const result = dependencyChain(graph, "/P/missing", "sideways");
      expect(!result.ok && result.error.code).toBe("InvalidDirection");
      expect(!result.ok && result.error.message).toBe(
        'Invalid direction "sideways". Must be one of: incoming, outgoing'
      );
    });

    it("reports an unknown start element", () => {
      const result = dependencyChain(graph, "/P/missing", "outgoing");
      expect(!result.ok && result.error.code).toBe("ElementNotFound");
    });

    it("rejects a NaN depth", () => {
      const result = dependencyChain(graph, "/P/a/Foo", "outgoing", Number.NaN);
      expect(!result.ok && result.error.code).toBe("InvalidArgument");
    });
  });

  describe("self-loops and parallel associations", () => {
    const built = buildGraph({
      root: {
        name: "R",
        type: "Model",
        children: [
          { name: "x", type: "Module" },
          { name: "y", type: "Module" },
        ],
      },
      associations: [
        { from: "/R/x", to: "/R/x", type: "self" },
        { from: "/R/x", to: "/R/y", type: "call" },
        { from: "/R/x", to: "/R/y", type: "import" },
        { from: "/R/y", to: "/R/x", type: "callback" },
      ],
    });
    if (!built.ok) throw built.error;
    const looped = built.value;

    it("places each association in exactly one set", () => {
      const result = analyzeSubtree(looped, "/R/x");
      if (!result.ok) throw result.error;
      const { internal, incoming, outgoing } = result.value;

      expect(internal.map((a) => a.type)).toEqual(["self"]);
      expect(outgoing.map((a) => a.type)).toEqual(["call", "import"]);
      expect(incoming.map((a) => a.type)).toEqual(["callback"]);
      expect(internal.length + incoming.length + outgoing.length).toBe(looped.associationCount);
    });

    it("visits each element once and records the first parallel edge", () => {
      const result = dependencyChain(looped, "/R/x", "outgoing");
      if (!result.ok) throw result.error;

      expect(levelPaths(result.value)).toEqual([["/R/x"], ["/R/y"]]);
      expect(result.value.levels[1].entries[0].via?.type).toBe("call");
      expect(result.value.visitedCount).toBe(2);
    });

    it("ignores a self-loop when walking incoming associations", () => {
      const result = dependencyChain(looped, "/R/x", "incoming");
      if (!result.ok) throw result.error;

      expect(levelPaths(result.value)).toEqual([["/R/x"], ["/R/y"]]);
      expect(result.value.levels[1].entries[0].via?.type).toBe("callback");
    });
  });
});
