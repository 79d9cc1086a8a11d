/**
 * model_load - Load a model file into the cache.
 */

import * as z from "zod/v4";

import type { ToolRegistrar } from "./types.js";
import { respond } from "./format.js";

export const registerLoadModel: ToolRegistrar = (server, { queries }) => {
  server.registerTool(
    "model_load",
    {
      title: "Load model",
      description: `Load a dependency model file (.json or .json.gz) and return its model id.

Every other tool takes the returned model_id. Loading the same file again creates a new id;
evict the old one with model_evict when it is no longer needed.`,
      inputSchema: {
        path: z.string().min(1).describe("Path to the model file"),
      },
    },
    async ({ path }) => {
      const result = await queries.load(path);
      return respond("model_load", result, (info) => ({
        text: [
          "## Model loaded",
          "",
          `**Model id:** ${info.id}`,
          `**Source:** ${info.sourceRef}`,
          `**Elements:** ${info.elementCount}`,
          `**Associations:** ${info.associationCount}`,
          `**Load time:** ${info.loadMs} ms`,
        ].join("\n"),
        data: { model_id: info.id, model: info },
      }));
    }
  );
};
