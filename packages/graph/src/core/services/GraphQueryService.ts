/**
 * GraphQueryService - resolves a model identifier through the cache and runs
 * a query against the resolved graph. Every query returns plain views.
 */

import { andThen, map } from "@hierograph/core";

import type {
  AssociationView,
  AttributeValue,
  ChainDirection,
  DependencyChain,
  Element,
  ElementLookup,
  ElementView,
  ModelInfo,
  MultipleElements,
  Overview,
  SubtreeDependencies,
} from "../model.js";
import { Err, Ok, isChainDirection, type Result } from "../model.js";
import type { Graph } from "../Graph.js";
import { toAssociationView, toElementView } from "../views.js";
import { elementNotFound, invalidDirection, type GraphError } from "../errors.js";
import type { ModelCache } from "./ModelCache.js";
import { searchByAttributes, searchByName, searchByType, type NameSearchOptions, type ScopeOptions } from "./SearchEngine.js";
import { analyzeSubtree, dependencyChain, type SubtreeOptions } from "./DependencyEngine.js";
import { generateOverview, type OverviewOptions } from "./OverviewGenerator.js";

export interface ElementAssociations {
  elementPath: string;
  direction: ChainDirection;
  associations: AssociationView[];
}

export class GraphQueryService {
  constructor(private readonly cache: ModelCache) {}

  // --- Model lifecycle ---

  load(sourceRef: string): Promise<Result<ModelInfo, GraphError>> {
    return this.cache.load(sourceRef);
  }

  listModels(): ModelInfo[] {
    return this.cache.list();
  }

  evict(modelId: string): boolean {
    return this.cache.evict(modelId);
  }

  clear(): number {
    return this.cache.clear();
  }

  overview(modelId: string, options: OverviewOptions = {}): Result<Overview, GraphError> {
    return this.withGraph(modelId, (graph) => generateOverview(graph, options));
  }

  // --- Navigation ---

  rootElement(modelId: string): Result<ElementView, GraphError> {
    return map(this.cache.get(modelId), (graph) => toElementView(graph.root));
  }

  element(modelId: string, path: string): Result<ElementView, GraphError> {
    return this.withGraph(modelId, (graph) => {
      const element = graph.resolve(path);
      return element ? Ok(toElementView(element)) : Err(elementNotFound(path));
    });
  }

  /**
   * The element's own incoming or outgoing associations; its children's are not included.
   */
  associations(modelId: string, path: string, direction: string): Result<ElementAssociations, GraphError> {
    if (!isChainDirection(direction)) {
      return Err(invalidDirection(direction));
    }
    const kind: ChainDirection = direction;
    return this.withGraph(modelId, (graph) => {
      const element = graph.resolve(path);
      if (!element) return Err(elementNotFound(path));
      const list = kind === "incoming" ? graph.incomingOf(path) : graph.outgoingOf(path);
      return Ok({ elementPath: path, direction: kind, associations: list.map(toAssociationView) });
    });
  }

  /**
   * Resolve each distinct path independently; missing paths are reported inline.
   */
  multipleElements(modelId: string, paths: readonly string[]): Result<MultipleElements, GraphError> {
    return map(this.cache.get(modelId), (graph) => {
      // Map keys, so a path such as "__proto__" gets its own entry
      const lookups = new Map<string, ElementLookup>();
      const notFound: string[] = [];
      let foundCount = 0;

      for (const path of new Set(paths)) {
        const element = graph.resolve(path);
        if (element) {
          lookups.set(path, { found: true, element: toElementView(element) });
          foundCount++;
        } else {
          lookups.set(path, { found: false, error: elementNotFound(path).message });
          notFound.push(path);
        }
      }

      return {
        requestedCount: lookups.size,
        foundCount,
        elements: Object.fromEntries(lookups),
        notFound,
      };
    });
  }

  // --- Search ---

  searchByName(modelId: string, pattern: string, options: NameSearchOptions = {}): Result<ElementView[], GraphError> {
    return this.withGraph(modelId, (graph) => map(searchByName(graph, pattern, options), toViews));
  }

  searchByType(modelId: string, type: string, options: ScopeOptions = {}): Result<ElementView[], GraphError> {
    return this.withGraph(modelId, (graph) => map(searchByType(graph, type, options), toViews));
  }

  searchByAttributes(
    modelId: string,
    filters: Readonly<Record<string, AttributeValue>>,
    options: ScopeOptions = {}
  ): Result<ElementView[], GraphError> {
    return this.withGraph(modelId, (graph) => map(searchByAttributes(graph, filters, options), toViews));
  }

  // --- Dependencies ---

  subtreeDependencies(
    modelId: string,
    scopePath: string,
    options: SubtreeOptions = {}
  ): Result<SubtreeDependencies, GraphError> {
    return this.withGraph(modelId, (graph) => analyzeSubtree(graph, scopePath, options));
  }

  dependencyChain(
    modelId: string,
    startPath: string,
    direction: string,
    maxDepth?: number
  ): Result<DependencyChain, GraphError> {
    return this.withGraph(modelId, (graph) => dependencyChain(graph, startPath, direction, maxDepth));
  }

  private withGraph<T>(modelId: string, query: (graph: Graph) => Result<T, GraphError>): Result<T, GraphError> {
    return andThen(this.cache.get(modelId), query);
  }
}

function toViews(elements: readonly Element[]): ElementView[] {
  return elements.map(toElementView);
}
