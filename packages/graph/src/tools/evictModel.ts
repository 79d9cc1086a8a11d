/**
 * model_evict - Drop a model from the cache.
 */

import { successResponse } from "@hierograph/core";

import type { ToolRegistrar } from "./types.js";
import { ModelIdSchema } from "./schemas.js";

export const registerEvictModel: ToolRegistrar = (server, { queries }) => {
  server.registerTool(
    "model_evict",
    {
      title: "Evict model",
      description: "Remove a model from memory. Evicting an unknown or already evicted id is not an error.",
      inputSchema: {
        model_id: ModelIdSchema,
      },
    },
    async ({ model_id }) => {
      const evicted = queries.evict(model_id);
      const text = evicted ? `Evicted model ${model_id}` : `Model ${model_id} was not loaded; nothing to evict`;
      return successResponse(text, { model_id, evicted });
    }
  );
};
