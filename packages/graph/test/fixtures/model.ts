import type { GraphDocument } from "../../src/core/model.js";
import type { Graph } from "../../src/core/Graph.js";
import { buildGraph, type BuildOptions } from "../../src/core/GraphBuilder.js";

/**
 * /P                      Project
 *   /P/a                  Package   layer=core
 *     /P/a/Foo            Class     visibility=public lines=120 abstract=false
 *     /P/a/FooHelper      Class     visibility=internal lines=40
 *   /P/b                  Package   layer=app
 *     /P/b/Bar            Class     visibility=public lines=80
 *     /P/b/sub            Package
 *       /P/b/sub/Baz      Interface visibility=public
 *   /P/External           Group
 *     /P/External/lodash  Library   version=4.17.21
 *
 * Foo -> Bar -> Baz -> Foo is a cycle.
 */
export function sampleDocument(): GraphDocument {
  return {
    root: {
      name: "P",
      type: "Project",
      children: [
        {
          name: "a",
          type: "Package",
          attributes: { layer: "core" },
          children: [
            { name: "Foo", type: "Class", attributes: { visibility: "public", lines: 120, abstract: false } },
            { name: "FooHelper", type: "Class", attributes: { visibility: "internal", lines: 40 } },
          ],
        },
        {
          name: "b",
          type: "Package",
          attributes: { layer: "app" },
          children: [
            { name: "Bar", type: "Class", attributes: { visibility: "public", lines: 80 } },
            {
              name: "sub",
              type: "Package",
              children: [{ name: "Baz", type: "Interface", attributes: { visibility: "public" } }],
            },
          ],
        },
        {
          name: "External",
          type: "Group",
          children: [{ name: "lodash", type: "Library", attributes: { version: "4.17.21" } }],
        },
      ],
    },
    associations: [
      { from: "/P/a/Foo", to: "/P/b/Bar", type: "uses" },
      { from: "/P/a/Foo", to: "/P/a/FooHelper", type: "calls" },
      { from: "/P/b/Bar", to: "/P/b/sub/Baz", type: "implements" },
      { from: "/P/b/sub/Baz", to: "/P/a/Foo", type: "references" },
      { from: "/P/a/FooHelper", to: "/P/External/lodash", type: "imports" },
      { from: "/P/b/Bar", to: "/P/External/lodash", type: "imports", attributes: { optional: true } },
    ],
  };
}

export function sampleGraph(options: BuildOptions = {}): Graph {
  const built = buildGraph(sampleDocument(), options);
  if (!built.ok) throw built.error;
  return built.value;
}

export function paths(items: readonly { path: string }[]): string[] {
  return items.map((item) => item.path);
}
