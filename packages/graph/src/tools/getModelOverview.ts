/**
 * model_overview - Depth-bounded structure summary of a model.
 */

import * as z from "zod/v4";

import type { OverviewNode } from "../core/model.js";
import { DEFAULT_OVERVIEW_DEPTH } from "../core/services/OverviewGenerator.js";
import type { ToolRegistrar } from "./types.js";
import { ModelIdSchema, ScopePathSchema } from "./schemas.js";
import { respond } from "./format.js";

const MAX_TREE_LINES = 200;

function treeLines(root: OverviewNode): string[] {
  const lines: string[] = [];
  const stack: OverviewNode[] = [root];
  while (stack.length > 0 && lines.length < MAX_TREE_LINES) {
    const node = stack.pop();
    if (node === undefined) break;

    const indent = "  ".repeat(node.depth);
    const counts = node.descendantCount !== undefined ? ` - ${node.descendantCount} below` : "";
    const more = node.hasMoreChildren !== undefined ? ` (+${node.hasMoreChildren} unexpanded)` : "";
    lines.push(`${indent}- ${node.name || "/"} [${node.type}]${counts}${more}`);

    const children = node.children ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
  if (stack.length > 0) {
    lines.push("  ...");
  }
  return lines;
}

export const registerGetModelOverview: ToolRegistrar = (server, { queries }) => {
  server.registerTool(
    "model_overview",
    {
      title: "Model overview",
      description: `Hierarchical overview of a model up to max_depth levels, with per-element counts.

Elements below max_depth are not listed; their parent reports how many children were left
unexpanded and, with include_counts, how many descendants of each type lie below it.`,
      inputSchema: {
        model_id: ModelIdSchema,
        max_depth: z.number().optional().describe(`Levels to expand (default: ${DEFAULT_OVERVIEW_DEPTH})`),
        include_counts: z.boolean().optional().describe("Include child, association and descendant counts (default: true)"),
        scope_path: ScopePathSchema,
      },
    },
    async ({ model_id, max_depth, include_counts, scope_path }) => {
      const result = queries.overview(model_id, {
        maxDepth: max_depth,
        includeCounts: include_counts,
        scopePath: scope_path,
      });

      return respond("model_overview", result, (overview) => ({
        text: [
          `## Overview of ${overview.scopePath || "/"} (depth ${overview.maxDepth ?? "unbounded"})`,
          "",
          `**Elements in scope:** ${overview.summary.totalElements}`,
          `**Shown:** ${overview.summary.visitedElements}`,
          "",
          ...treeLines(overview.root),
        ].join("\n"),
        data: { overview },
      }));
    }
  );
};
