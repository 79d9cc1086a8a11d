/**
 * element_get_root - The root element of a model.
 */

import type { ToolRegistrar } from "./types.js";
import { ModelIdSchema } from "./schemas.js";
import { elementLine, respond } from "./format.js";

export const registerGetRootElement: ToolRegistrar = (server, { queries }) => {
  server.registerTool(
    "element_get_root",
    {
      title: "Get root element",
      description: "Get the root element of a model and the paths of its children.",
      inputSchema: {
        model_id: ModelIdSchema,
      },
    },
    async ({ model_id }) => {
      const result = queries.rootElement(model_id);
      return respond("element_get_root", result, (element) => ({
        text: [elementLine(element), `Children: ${element.childPaths.length}`].join("\n"),
        data: { element },
      }));
    }
  );
};
