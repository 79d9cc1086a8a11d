/**
 * deps_subtree - Internal, incoming and outgoing associations of a subtree.
 */

import * as z from "zod/v4";

import type { ClassifiedAssociation } from "../core/model.js";
import type { ToolRegistrar } from "./types.js";
import { ElementPathSchema, ModelIdSchema } from "./schemas.js";
import { listLines, respond } from "./format.js";

function section(title: string, associations: readonly ClassifiedAssociation[]): string[] {
  if (associations.length === 0) return [];
  return [
    "",
    `### ${title} (${associations.length})`,
    ...listLines(associations, (a) => `- ${a.from} → ${a.to} [${a.type}]`),
  ];
}

export const registerGetSubtreeDependencies: ToolRegistrar = (server, { queries }) => {
  server.registerTool(
    "deps_subtree",
    {
      title: "Subtree dependencies",
      description: `Classify every association touching a subtree.

internal: both ends inside the subtree. incoming: from outside to inside. outgoing: from inside to outside.
With include_external=false, associations whose outside end is an External element are dropped.
max_depth limits how many levels below root_path are reported individually; deeper endpoints are
attributed to their nearest reported ancestor.`,
      inputSchema: {
        model_id: ModelIdSchema,
        root_path: ElementPathSchema.describe("Root of the subtree to analyze"),
        include_external: z.boolean().optional().describe("Keep associations to External elements (default: true)"),
        max_depth: z.number().optional().describe("Levels below root_path to analyze individually (default: unbounded)"),
      },
    },
    async ({ model_id, root_path, include_external, max_depth }) => {
      const result = queries.subtreeDependencies(model_id, root_path, {
        includeExternal: include_external,
        maxDepth: max_depth,
      });
      return respond("deps_subtree", result, (deps) => ({
        text: [
          `## Dependencies of ${deps.scopePath || "/"}`,
          "",
          `**Elements analyzed:** ${deps.elements.length}`,
          `**Internal:** ${deps.internal.length}`,
          `**Incoming:** ${deps.incoming.length}`,
          `**Outgoing:** ${deps.outgoing.length}`,
          ...section("Incoming", deps.incoming),
          ...section("Outgoing", deps.outgoing),
        ].join("\n"),
        data: {
          root_path: deps.scopePath,
          include_external: deps.includeExternal,
          max_depth: deps.maxDepth,
          elements: deps.elements,
          internal: deps.internal,
          incoming: deps.incoming,
          outgoing: deps.outgoing,
        },
      }));
    }
  );
};
