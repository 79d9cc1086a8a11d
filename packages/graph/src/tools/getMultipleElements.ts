/**
 * elements_get_multiple - Resolve many paths in one call.
 */

import * as z from "zod/v4";

import type { ToolRegistrar } from "./types.js";
import { ModelIdSchema } from "./schemas.js";
import { respond } from "./format.js";

export const registerGetMultipleElements: ToolRegistrar = (server, { queries }) => {
  server.registerTool(
    "elements_get_multiple",
    {
      title: "Get multiple elements",
      description:
        "Resolve several element paths at once. Paths that do not resolve are reported per path; the call itself still succeeds.",
      inputSchema: {
        model_id: ModelIdSchema,
        element_paths: z.array(z.string()).describe("Element paths to resolve"),
      },
    },
    async ({ model_id, element_paths }) => {
      const result = queries.multipleElements(model_id, element_paths);
      return respond("elements_get_multiple", result, (batch) => {
        const lines = [`Found ${batch.foundCount} of ${batch.requestedCount} element(s)`];
        if (batch.notFound.length > 0) {
          lines.push(`Not found: ${batch.notFound.join(", ")}`);
        }
        return {
          text: lines.join("\n"),
          data: {
            requested_count: batch.requestedCount,
            found_count: batch.foundCount,
            elements: batch.elements,
            not_found: batch.notFound,
          },
        };
      });
    }
  );
};
