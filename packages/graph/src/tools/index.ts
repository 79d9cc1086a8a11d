/**
 * Tool registration for the graph server.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { Services, ToolRegistrar } from "./types.js";
import { registerLoadModel } from "./loadModel.js";
import { registerListModels } from "./listModels.js";
import { registerEvictModel } from "./evictModel.js";
import { registerClearModels } from "./clearModels.js";
import { registerGetModelOverview } from "./getModelOverview.js";
import { registerGetRootElement } from "./getRootElement.js";
import { registerGetElement } from "./getElement.js";
import { registerGetAssociations } from "./getAssociations.js";
import { registerGetMultipleElements } from "./getMultipleElements.js";
import { registerSearchByName } from "./searchByName.js";
import { registerSearchByType } from "./searchByType.js";
import { registerSearchByAttributes } from "./searchByAttributes.js";
import { registerGetSubtreeDependencies } from "./getSubtreeDependencies.js";
import { registerGetDependencyChain } from "./getDependencyChain.js";

export type { Services, ToolRegistrar } from "./types.js";

export const allTools: ToolRegistrar[] = [
  registerLoadModel,
  registerListModels,
  registerEvictModel,
  registerClearModels,
  registerGetModelOverview,
  registerGetRootElement,
  registerGetElement,
  registerGetAssociations,
  registerGetMultipleElements,
  registerSearchByName,
  registerSearchByType,
  registerSearchByAttributes,
  registerGetSubtreeDependencies,
  registerGetDependencyChain,
];

export function registerAllTools(server: McpServer, services: Services): void {
  for (const register of allTools) {
    register(server, services);
  }
}
