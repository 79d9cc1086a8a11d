/**
 * search_by_type - Find elements of an exact type.
 */

import * as z from "zod/v4";

import type { ToolRegistrar } from "./types.js";
import { LimitSchema, ModelIdSchema, ScopePathSchema } from "./schemas.js";
import { formatElementMatches, limitElements, respond } from "./format.js";

export const registerSearchByType: ToolRegistrar = (server, { queries, searchLimit }) => {
  server.registerTool(
    "search_by_type",
    {
      title: "Search by type",
      description: "Find elements whose type equals element_type exactly. Results are in hierarchy order.",
      inputSchema: {
        model_id: ModelIdSchema,
        element_type: z.string().describe("Element type, e.g. Class or File"),
        scope_path: ScopePathSchema,
        limit: LimitSchema,
      },
    },
    async ({ model_id, element_type, scope_path, limit }) => {
      const result = queries.searchByType(model_id, element_type, { scopePath: scope_path });
      return respond("search_by_type", result, (elements) => {
        const matches = limitElements(elements, limit ?? searchLimit);
        return { text: formatElementMatches(`of type ${element_type}`, matches), data: matches };
      });
    }
  );
};
