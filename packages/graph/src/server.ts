#!/usr/bin/env node
/**
 * MCP server for hierarchical dependency models.
 * Loads model files on request and answers navigation, search and
 * dependency queries over them.
 */

import { runServer } from "@hierograph/core";

import { loadConfig } from "./config.js";
import { createServices, preloadModels } from "./services.js";
import { registerAllTools, type Services } from "./tools/index.js";

interface ServerServices extends Services {
  preload: string[];
}

runServer<ServerServices>({
  config: {
    name: "hierograph",
    version: "0.1.0",
  },
  createServices: () => {
    const config = loadConfig();
    return { ...createServices(config), preload: config.preload };
  },
  registerTools: registerAllTools,
  onStartup: async (services) => {
    if (services.preload.length === 0) return;
    console.error(`[hierograph] Preloading ${services.preload.length} model(s)`);
    await preloadModels(services, services.preload);
  },
  onShutdown: (services) => {
    const cleared = services.queries.clear();
    console.error(`[hierograph] Released ${cleared} model(s)`);
  },
});
