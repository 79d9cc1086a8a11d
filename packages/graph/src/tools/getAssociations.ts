/**
 * element_get_associations - An element's own incoming or outgoing associations.
 */

import type { ToolRegistrar } from "./types.js";
import { DirectionSchema, ElementPathSchema, ModelIdSchema } from "./schemas.js";
import { associationLine, listLines, respond } from "./format.js";

export const registerGetAssociations: ToolRegistrar = (server, { queries }) => {
  server.registerTool(
    "element_get_associations",
    {
      title: "Get element associations",
      description:
        "Get the incoming or outgoing associations of a single element. Associations of its children are not included.",
      inputSchema: {
        model_id: ModelIdSchema,
        element_path: ElementPathSchema,
        direction: DirectionSchema,
      },
    },
    async ({ model_id, element_path, direction }) => {
      const result = queries.associations(model_id, element_path, direction);
      return respond("element_get_associations", result, (found) => ({
        text:
          found.associations.length === 0
            ? `No ${found.direction} associations for ${found.elementPath}`
            : [
                `## ${found.associations.length} ${found.direction} association(s) of ${found.elementPath}`,
                "",
                ...listLines(found.associations, associationLine),
              ].join("\n"),
        data: {
          element_path: found.elementPath,
          direction: found.direction,
          associations: found.associations,
          count: found.associations.length,
        },
      }));
    }
  );
};
