/**
 * Owns the loaded graphs, keyed by opaque identifiers.
 *
 * Loading reads and validates outside the table and inserts the finished
 * entry in one synchronous step, so readers never observe a partial graph.
 * Evicting only drops the table's reference: a Graph already handed to a
 * running query stays usable until that query finishes.
 */

import { nanoid } from "nanoid";
import { toError } from "@hierograph/core";

import type { GraphDocument, ModelInfo } from "../model.js";
import { Err, Ok, type Result } from "../model.js";
import type { Graph } from "../Graph.js";
import { buildGraph, DEFAULT_EXTERNAL_SEGMENT } from "../GraphBuilder.js";
import { GraphError, loadError, notLoaded } from "../errors.js";
import type { GraphLoader } from "../ports/GraphLoader.js";

export const DEFAULT_LOAD_TIMEOUT_MS = 60_000;
const MODEL_ID_LENGTH = 24;

export interface ModelCacheOptions {
  loader: GraphLoader;
  loadTimeoutMs?: number;
  /** Path segment that marks external-dependency subtrees */
  externalSegment?: string;
  generateId?: () => string;
  log?: (message: string) => void;
}

interface CacheEntry {
  info: ModelInfo;
  graph: Graph;
}

export class ModelCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly issuedIds = new Set<string>();

  private readonly loader: GraphLoader;
  private readonly loadTimeoutMs: number;
  private readonly externalSegment: string;
  private readonly generateId: () => string;
  private readonly log: (message: string) => void;

  constructor(options: ModelCacheOptions) {
    this.loader = options.loader;
    this.loadTimeoutMs = options.loadTimeoutMs ?? DEFAULT_LOAD_TIMEOUT_MS;
    this.externalSegment = options.externalSegment ?? DEFAULT_EXTERNAL_SEGMENT;
    this.generateId = options.generateId ?? (() => nanoid(MODEL_ID_LENGTH));
    this.log = options.log ?? ((message) => console.error(`[hierograph] ${message}`));
  }

  /**
   * Load, validate and cache a graph. The table is untouched on failure.
   */
  async load(sourceRef: string): Promise<Result<ModelInfo, GraphError>> {
    this.log(`Loading model from ${sourceRef}`);
    const startTime = performance.now();

    const document = await this.readDocument(sourceRef);
    if (!document.ok) {
      this.log(`Load failed: ${document.error.message}`);
      return document;
    }

    const built = buildGraph(document.value, { externalSegment: this.externalSegment });
    if (!built.ok) {
      const error = loadError(`Malformed model ${sourceRef}: ${built.error.message}`, built.error);
      this.log(`Load failed: ${error.message}`);
      return Err(error);
    }

    const graph = built.value;
    const info: ModelInfo = {
      id: this.nextId(),
      sourceRef,
      loadedAt: new Date().toISOString(),
      elementCount: graph.elementCount,
      associationCount: graph.associationCount,
      rootPath: graph.root.path,
      loadMs: Math.round(performance.now() - startTime),
    };

    this.entries.set(info.id, { info, graph });
    this.log(
      `Loaded ${info.id}: ${info.elementCount} elements, ${info.associationCount} associations ` +
        `in ${info.loadMs} ms (${this.entries.size} cached)`
    );
    return Ok({ ...info });
  }

  get(id: string): Result<Graph, GraphError> {
    const entry = this.entries.get(id);
    return entry ? Ok(entry.graph) : Err(notLoaded(id));
  }

  info(id: string): Result<ModelInfo, GraphError> {
    const entry = this.entries.get(id);
    return entry ? Ok({ ...entry.info }) : Err(notLoaded(id));
  }

  /**
   * Remove a cached graph. Unknown identifiers are a no-op.
   * @returns whether an entry was removed
   */
  evict(id: string): boolean {
    const removed = this.entries.delete(id);
    if (removed) {
      this.log(`Evicted ${id} (${this.entries.size} cached)`);
    }
    return removed;
  }

  /**
   * Evict every cached graph.
   * @returns the number of graphs evicted
   */
  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    if (count > 0) {
      this.log(`Cleared ${count} model(s)`);
    }
    return count;
  }

  list(): ModelInfo[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry.info }));
  }

  get size(): number {
    return this.entries.size;
  }

  private async readDocument(sourceRef: string): Promise<Result<GraphDocument, GraphError>> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const error = loadError(`Model loading timed out after ${this.loadTimeoutMs} ms: ${sourceRef}`);
        controller.abort(error);
        reject(error);
      }, this.loadTimeoutMs);
    });

    try {
      return Ok(await Promise.race([this.loader.load(sourceRef, controller.signal), timeout]));
    } catch (e) {
      if (e instanceof GraphError && e.code === "LoadError") return Err(e);
      const cause = toError(e);
      return Err(loadError(`Failed to load model from ${sourceRef}: ${cause.message}`, cause));
    } finally {
      clearTimeout(timer);
    }
  }

  // Identifiers are never reissued, even after eviction
  private nextId(): string {
    let id = this.generateId();
    while (this.issuedIds.has(id)) {
      id = this.generateId();
    }
    this.issuedIds.add(id);
    return id;
  }
}
