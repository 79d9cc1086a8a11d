/**
 * model_clear - Drop every cached model.
 */

import { successResponse } from "@hierograph/core";

import type { ToolRegistrar } from "./types.js";

export const registerClearModels: ToolRegistrar = (server, { queries }) => {
  server.registerTool(
    "model_clear",
    {
      title: "Clear models",
      description: "Remove all models from memory.",
      inputSchema: {},
    },
    async () => {
      const cleared = queries.clear();
      return successResponse(`Cleared ${cleared} model(s)`, { cleared });
    }
  );
};
