/**
 * MCP server bootstrap.
 * Creates services, registers tools and runs the stdio transport with
 * signal-driven shutdown.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Configuration for an MCP server.
 */
export interface ServerConfig {
  name: string;
  version: string;
}

/**
 * Options for bootstrapping an MCP server.
 */
export interface ServerBootstrapOptions<S> {
  /** Server name and version configuration */
  config: ServerConfig;

  /** Factory function to create services */
  createServices: () => S | Promise<S>;

  /** Function to register all tools with the server */
  registerTools: (server: McpServer, services: S) => void;

  /** Runs after tool registration, before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  /** Runs on SIGTERM/SIGINT before the server closes */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Create an MCP server with all tools registered, without connecting it.
 * Tests connect the result to an in-memory transport.
 */
export function createServer<S>(
  config: ServerConfig,
  services: S,
  registerTools: (server: McpServer, services: S) => void
): McpServer {
  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);
  return server;
}

/**
 * Bootstrap an MCP server on stdio.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "hierograph", version: "0.1.0" },
 *   createServices: () => ({ cache: new ModelCache({ loader }) }),
 *   registerTools: registerAllTools,
 *   onShutdown: (services) => {
 *     services.cache.clear();
 *   },
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();
  const server = createServer(config, services, registerTools);
  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };

  const handleSignal = (): void => {
    shutdown().catch((error: unknown) => {
      console.error(`[${config.name}] Shutdown failed:`, error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", handleSignal);
  process.on("SIGINT", handleSignal);

  await onStartup?.(services);

  await server.connect(transport);
}

/**
 * Run bootstrapServer, exiting the process on a fatal startup error.
 * This is the entry point for MCP servers.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error(`[${options.config.name}] Fatal error:`, error);
    process.exit(1);
  });
}

// Re-export McpServer for tool registration
export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
