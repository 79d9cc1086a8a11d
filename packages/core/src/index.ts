export type { Result } from "./result.js";
export { Ok, Err, map, andThen, toError } from "./result.js";

export type { TextContent, ToolResponse, ErrorContent } from "./mcp.js";
export {
  errorResponse,
  successResponse,
  errorCode,
  resultToStructuredResponse,
} from "./mcp.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { createServer, bootstrapServer, runServer, McpServer } from "./server.js";
