/**
 * element_get - A single element by path.
 */

import type { ToolRegistrar } from "./types.js";
import { ElementPathSchema, ModelIdSchema } from "./schemas.js";
import { elementLine, listLines, respond } from "./format.js";

export const registerGetElement: ToolRegistrar = (server, { queries }) => {
  server.registerTool(
    "element_get",
    {
      title: "Get element",
      description: "Get an element by its path: name, type, attributes, parent and child paths.",
      inputSchema: {
        model_id: ModelIdSchema,
        element_path: ElementPathSchema,
      },
    },
    async ({ model_id, element_path }) => {
      const result = queries.element(model_id, element_path);
      return respond("element_get", result, (element) => {
        const attributes = Object.entries(element.attributes);
        const lines = [elementLine(element)];
        if (attributes.length > 0) {
          lines.push("", "Attributes:", ...listLines(attributes, ([name, value]) => `- ${name}: ${String(value)}`));
        }
        if (element.childPaths.length > 0) {
          lines.push("", "Children:", ...listLines(element.childPaths, (path) => `- ${path}`));
        }
        return { text: lines.join("\n"), data: { element } };
      });
    }
  );
};
