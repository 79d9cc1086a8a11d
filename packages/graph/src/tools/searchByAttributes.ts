/**
 * search_by_attributes - Find elements carrying given attribute values.
 */

import * as z from "zod/v4";

import type { ToolRegistrar } from "./types.js";
import { AttributeValueSchema, LimitSchema, ModelIdSchema, ScopePathSchema } from "./schemas.js";
import { formatElementMatches, limitElements, respond } from "./format.js";

export const registerSearchByAttributes: ToolRegistrar = (server, { queries, searchLimit }) => {
  server.registerTool(
    "search_by_attributes",
    {
      title: "Search by attributes",
      description: `Find elements that carry every given attribute with an equal value.

Values compare strictly: the string "1" does not match the number 1.`,
      inputSchema: {
        model_id: ModelIdSchema,
        attribute_filters: z.record(z.string(), AttributeValueSchema).describe("Attribute name to required value"),
        scope_path: ScopePathSchema,
        limit: LimitSchema,
      },
    },
    async ({ model_id, attribute_filters, scope_path, limit }) => {
      const result = queries.searchByAttributes(model_id, attribute_filters, { scopePath: scope_path });
      return respond("search_by_attributes", result, (elements) => {
        const description = Object.entries(attribute_filters)
          .map(([name, value]) => `${name}=${String(value)}`)
          .join(", ");
        const matches = limitElements(elements, limit ?? searchLimit);
        return { text: formatElementMatches(`with ${description}`, matches), data: matches };
      });
    }
  );
};
