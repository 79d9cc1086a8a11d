/**
 * search_by_name - Find elements whose name matches a regex or glob.
 */

import * as z from "zod/v4";

import type { ToolRegistrar } from "./types.js";
import { LimitSchema, ModelIdSchema, PatternKindSchema, ScopePathSchema } from "./schemas.js";
import { formatElementMatches, limitElements, respond } from "./format.js";

export const registerSearchByName: ToolRegistrar = (server, { queries, searchLimit }) => {
  server.registerTool(
    "search_by_name",
    {
      title: "Search by name",
      description: `Find elements whose name matches a pattern.

Regex patterns match anywhere in the name; glob patterns (*, ?, [abc]) must match the whole name.
Results are in hierarchy order.`,
      inputSchema: {
        model_id: ModelIdSchema,
        pattern: z.string().describe("Name pattern"),
        pattern_kind: PatternKindSchema.optional().describe('"regex" (default) or "glob"'),
        element_type: z.string().optional().describe("Keep only elements of this exact type"),
        scope_path: ScopePathSchema,
        limit: LimitSchema,
      },
    },
    async ({ model_id, pattern, pattern_kind, element_type, scope_path, limit }) => {
      const result = queries.searchByName(model_id, pattern, {
        patternKind: pattern_kind,
        type: element_type,
        scopePath: scope_path,
      });
      return respond("search_by_name", result, (elements) => {
        const matches = limitElements(elements, limit ?? searchLimit);
        return { text: formatElementMatches(`matching "${pattern}"`, matches), data: matches };
      });
    }
  );
};
