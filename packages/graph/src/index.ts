/**
 * @hierograph/graph
 * Query server for hierarchical dependency models.
 */

// Model
export type {
  AttributeValue,
  Attributes,
  Element,
  Association,
  ElementSpec,
  AssociationSpec,
  GraphDocument,
  ElementView,
  AssociationView,
  ModelInfo,
  PatternKind,
  ChainDirection,
  ClassifiedAssociation,
  SubtreeDependencies,
  ChainEntry,
  ChainLevel,
  DependencyChain,
  OverviewNode,
  Overview,
  ElementLookup,
  MultipleElements,
} from "./core/model.js";
export { CHAIN_DIRECTIONS, isChainDirection } from "./core/model.js";
export { GraphError, type GraphErrorCode } from "./core/errors.js";

// Graph
export { Graph } from "./core/Graph.js";
export { PathIndex, isWithin } from "./core/PathIndex.js";
export { buildGraph, DEFAULT_EXTERNAL_SEGMENT } from "./core/GraphBuilder.js";

// Services
export type { GraphLoader } from "./core/ports/index.js";
export { ModelCache, DEFAULT_LOAD_TIMEOUT_MS, type ModelCacheOptions } from "./core/services/ModelCache.js";
export { GraphQueryService, type ElementAssociations } from "./core/services/GraphQueryService.js";

// Loaders
export { FileGraphLoader } from "./infrastructure/FileGraphLoader.js";
export { InMemoryGraphLoader } from "./infrastructure/InMemoryGraphLoader.js";
export { parseModelFile, modelFileToDocument, type ModelFile } from "./infrastructure/modelFile.js";

// Server
export { loadConfig, DEFAULT_SEARCH_LIMIT, type GraphServerConfig } from "./config.js";
export { createServices, preloadModels } from "./services.js";
export { registerAllTools, allTools, type Services, type ToolRegistrar } from "./tools/index.js";
