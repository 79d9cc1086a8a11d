import type { GraphDocument } from "../model.js";

/**
 * Port for reading a graph document from a source reference
 * (a file path, an archive, a registered name).
 */
export interface GraphLoader {
  /**
   * Read and parse the source. Rejects when the source is unreadable or
   * malformed. `signal` aborts when the cache gives up on the load.
   */
  load(sourceRef: string, signal: AbortSignal): Promise<GraphDocument>;
}
