/**
 * model_list - List cached models.
 */

import { successResponse } from "@hierograph/core";

import type { ToolRegistrar } from "./types.js";

export const registerListModels: ToolRegistrar = (server, { queries }) => {
  server.registerTool(
    "model_list",
    {
      title: "List models",
      description: "List the models currently held in memory, with their source and size.",
      inputSchema: {},
    },
    async () => {
      const models = queries.listModels();

      const text =
        models.length === 0
          ? "No models loaded"
          : models
              .map((m) => `- **${m.id}** ${m.sourceRef} (${m.elementCount} elements, loaded ${m.loadedAt})`)
              .join("\n");

      return successResponse(text, { models, count: models.length });
    }
  );
};
