import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createServer, type McpServer } from "@hierograph/core";

import { createServices } from "../src/services.js";
import { loadConfig } from "../src/config.js";
import { registerAllTools } from "../src/tools/index.js";
import { InMemoryGraphLoader } from "../src/infrastructure/InMemoryGraphLoader.js";
import { sampleDocument } from "./fixtures/model.js";

interface ToolOutcome {
  isError: boolean;
  text: string;
  data: Record<string, unknown>;
}

describe("graph tools", () => {
  let server: McpServer;
  let client: Client;

  async function call(name: string, args: Record<string, unknown> = {}): Promise<ToolOutcome> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const text = result.content.map((block) => (block.type === "text" ? block.text : "")).join("\n");
    return { isError: result.isError ?? false, text, data: result.structuredContent ?? {} };
  }

  async function loadSample(): Promise<string> {
    const { data } = await call("model_load", { path: "sample" });
    if (typeof data.model_id !== "string") throw new Error("model_load returned no id");
    return data.model_id;
  }

  beforeEach(async () => {
    const loader = new InMemoryGraphLoader().register("sample", sampleDocument());
    const services = createServices(loadConfig({ HIEROGRAPH_SEARCH_LIMIT: "2" }), loader);
    server = createServer({ name: "hierograph-test", version: "0.0.0" }, services, registerAllTools);

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "test-client", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("registers every tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "deps_chain",
      "deps_subtree",
      "element_get",
      "element_get_associations",
      "element_get_root",
      "elements_get_multiple",
      "model_clear",
      "model_evict",
      "model_list",
      "model_load",
      "model_overview",
      "search_by_attributes",
      "search_by_name",
      "search_by_type",
    ]);
  });

  describe("model lifecycle", () => {
    it("loads a model and lists it", async () => {
      const loaded = await call("model_load", { path: "sample" });
      expect(loaded.isError).toBe(false);
      expect(loaded.data).toMatchObject({ success: true, model: { elementCount: 10, associationCount: 6 } });
      expect(loaded.text).toContain("**Elements:** 10");

      const listed = await call("model_list");
      expect(listed.data).toMatchObject({ success: true, count: 1 });
    });

    it("reports a failed load with its error code", async () => {
      const result = await call("model_load", { path: "missing" });
      expect(result.isError).toBe(true);
      expect(result.data).toEqual({
        success: false,
        error: 'Failed to load model from missing: No model registered as "missing"',
        code: "LoadError",
      });
      expect(result.text).toBe('Error: Failed to load model from missing: No model registered as "missing"');
    });

    it("evicts a model idempotently", async () => {
      const modelId = await loadSample();

      expect((await call("model_evict", { model_id: modelId })).data).toEqual({
        success: true,
        model_id: modelId,
        evicted: true,
      });
      expect((await call("model_evict", { model_id: modelId })).data.evicted).toBe(false);

      const after = await call("element_get", { model_id: modelId, element_path: "/P" });
      expect(after.isError).toBe(true);
      expect(after.data.code).toBe("NotLoaded");
    });

    it("clears all models", async () => {
      await loadSample();
      await loadSample();
      expect((await call("model_clear")).data).toEqual({ success: true, cleared: 2 });
      expect((await call("model_list")).data.count).toBe(0);
    });
  });

  describe("navigation", () => {
    it("returns the root element", async () => {
      const modelId = await loadSample();
      const result = await call("element_get_root", { model_id: modelId });
      expect(result.data.element).toMatchObject({ path: "/P", childPaths: ["/P/a", "/P/b", "/P/External"] });
    });

    it("returns an element with its attributes", async () => {
      const modelId = await loadSample();
      const result = await call("element_get", { model_id: modelId, element_path: "/P/a/Foo" });
      expect(result.data.element).toMatchObject({ type: "Class", attributes: { lines: 120 } });
      expect(result.text).toContain("- lines: 120");
    });

    it("returns an element's incoming associations", async () => {
      const modelId = await loadSample();
      const result = await call("element_get_associations", {
        model_id: modelId,
        element_path: "/P/a/Foo",
        direction: "incoming",
      });
      expect(result.data).toMatchObject({ direction: "incoming", count: 1 });
      expect(result.text).toContain("- /P/b/sub/Baz → /P/a/Foo [references]");
    });

    it("resolves several paths in one call", async () => {
      const modelId = await loadSample();
      const result = await call("elements_get_multiple", {
        model_id: modelId,
        element_paths: ["/P/a/Foo", "/P/nope", "/P/b"],
      });
      expect(result.isError).toBe(false);
      expect(result.data).toMatchObject({ requested_count: 3, found_count: 2, not_found: ["/P/nope"] });
      expect(result.text).toBe("Found 2 of 3 element(s)\nNot found: /P/nope");
    });

    it("summarizes the model", async () => {
      const modelId = await loadSample();
      const result = await call("model_overview", { model_id: modelId, max_depth: 1 });
      expect(result.data.overview).toMatchObject({
        maxDepth: 1,
        summary: { totalElements: 10, visitedElements: 4 },
      });
      expect(result.text).toContain("  - a [Package] - 2 below (+2 unexpanded)");
    });
  });

  describe("search", () => {
    it("finds elements by glob", async () => {
      const modelId = await loadSample();
      const result = await call("search_by_name", { model_id: modelId, pattern: "Foo", pattern_kind: "glob" });
      expect(result.data).toMatchObject({ count: 1, total: 1, truncated: false, elements: [{ path: "/P/a/Foo" }] });
    });

    it("applies the configured default limit", async () => {
      const modelId = await loadSample();
      const result = await call("search_by_type", { model_id: modelId, element_type: "Class" });
      expect(result.data).toMatchObject({ count: 2, total: 3, truncated: true });
      expect(result.text).toContain("Showing 2 of 3");
    });

    it("lets the caller raise the limit", async () => {
      const modelId = await loadSample();
      const result = await call("search_by_type", { model_id: modelId, element_type: "Class", limit: 10 });
      expect(result.data).toMatchObject({ count: 3, truncated: false });
    });

    it("finds elements by attribute values", async () => {
      const modelId = await loadSample();
      const result = await call("search_by_attributes", {
        model_id: modelId,
        attribute_filters: { visibility: "public", lines: 80 },
      });
      expect(result.data).toMatchObject({ count: 1, elements: [{ path: "/P/b/Bar" }] });
    });

    it("reports an invalid pattern", async () => {
      const modelId = await loadSample();
      const result = await call("search_by_name", { model_id: modelId, pattern: "(" });
      expect(result.isError).toBe(true);
      expect(result.data.code).toBe("InvalidPattern");
    });
  });

  describe("dependencies", () => {
    it("classifies a subtree's associations", async () => {
      const modelId = await loadSample();
      const result = await call("deps_subtree", {
        model_id: modelId,
        root_path: "/P/a",
        include_external: false,
      });
      expect(result.data).toMatchObject({
        root_path: "/P/a",
        include_external: false,
        internal: [{ from: "/P/a/Foo", to: "/P/a/FooHelper" }],
        incoming: [{ from: "/P/b/sub/Baz" }],
        outgoing: [{ to: "/P/b/Bar" }],
      });
    });

    it("follows a dependency chain", async () => {
      const modelId = await loadSample();
      const result = await call("deps_chain", {
        model_id: modelId,
        element_path: "/P/a/Foo",
        direction: "outgoing",
      });
      expect(result.data).toMatchObject({ visited_count: 5, truncated: false });
      expect(result.text).toContain("### Depth 2 (2)");
    });

    it("reports an invalid direction", async () => {
      const modelId = await loadSample();
      const result = await call("deps_chain", {
        model_id: modelId,
        element_path: "/P/a/Foo",
        direction: "sideways",
      });
      expect(result.isError).toBe(true);
      expect(result.data).toEqual({
        success: false,
        error: 'Invalid direction "sideways". Must be one of: incoming, outgoing',
        code: "InvalidDirection",
      });
    });
  });
});
