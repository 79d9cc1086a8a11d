/**
 * deps_chain - Breadth-first dependency chain from one element.
 */

import * as z from "zod/v4";

import type { ToolRegistrar } from "./types.js";
import { DirectionSchema, ElementPathSchema, ModelIdSchema } from "./schemas.js";
import { listLines, respond } from "./format.js";

export const registerGetDependencyChain: ToolRegistrar = (server, { queries }) => {
  server.registerTool(
    "deps_chain",
    {
      title: "Dependency chain",
      description: `Follow associations from an element, level by level.

Level 0 is the element itself; level n holds the elements first reached after n hops.
Cycles are followed once. Without max_depth the walk continues until nothing new is reached.`,
      inputSchema: {
        model_id: ModelIdSchema,
        element_path: ElementPathSchema,
        direction: DirectionSchema,
        max_depth: z.number().optional().describe("Maximum hops to follow (default: unbounded)"),
      },
    },
    async ({ model_id, element_path, direction, max_depth }) => {
      const result = queries.dependencyChain(model_id, element_path, direction, max_depth);
      return respond("deps_chain", result, (chain) => {
        const lines = [`## ${chain.direction} chain from ${chain.startPath || "/"}`, ""];
        for (const level of chain.levels.slice(1)) {
          lines.push(
            `### Depth ${level.depth} (${level.entries.length})`,
            ...listLines(level.entries, (entry) => `- ${entry.element.path} [${entry.element.type}]`),
            ""
          );
        }
        if (chain.levels.length === 1) {
          lines.push("No dependencies reached.");
        }
        if (chain.truncated) {
          lines.push("Stopped at max_depth; more elements are reachable.");
        }
        return {
          text: lines.join("\n").trimEnd(),
          data: {
            start_path: chain.startPath,
            direction: chain.direction,
            max_depth: chain.maxDepth,
            levels: chain.levels,
            visited_count: chain.visitedCount,
            truncated: chain.truncated,
          },
        };
      });
    }
  );
};
