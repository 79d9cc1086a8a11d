import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { GraphQueryService } from "../core/services/GraphQueryService.js";

export interface Services {
  queries: GraphQueryService;
  /** Default result cap of the search tools */
  searchLimit: number;
}

export interface ToolRegistrar {
  (server: McpServer, services: Services): void;
}
