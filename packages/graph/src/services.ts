/**
 * Service wiring for the graph server.
 */

import type { GraphServerConfig } from "./config.js";
import type { GraphLoader } from "./core/ports/GraphLoader.js";
import { ModelCache } from "./core/services/ModelCache.js";
import { GraphQueryService } from "./core/services/GraphQueryService.js";
import { FileGraphLoader } from "./infrastructure/FileGraphLoader.js";
import type { Services } from "./tools/index.js";

export function createServices(config: GraphServerConfig, loader: GraphLoader = new FileGraphLoader()): Services {
  const cache = new ModelCache({
    loader,
    loadTimeoutMs: config.loadTimeoutMs,
    externalSegment: config.externalSegment,
  });
  return {
    queries: new GraphQueryService(cache),
    searchLimit: config.searchLimit,
  };
}

/**
 * Load each configured model once. A model that fails to load is reported
 * and skipped; the server still starts.
 */
export async function preloadModels(
  services: Services,
  sources: readonly string[],
  log: (message: string) => void = (message) => console.error(`[hierograph] ${message}`)
): Promise<string[]> {
  const ids: string[] = [];
  for (const source of sources) {
    const result = await services.queries.load(source);
    if (result.ok) {
      ids.push(result.value.id);
      log(`Preloaded ${source} as ${result.value.id}`);
    } else {
      log(`Warning: could not preload ${source}: ${result.error.message}`);
    }
  }
  return ids;
}
