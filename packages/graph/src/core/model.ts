/**
 * Core data model for cached dependency graphs.
 * Elements form a tree addressed by slash-delimited paths; associations are
 * typed, directed edges between elements of the same graph.
 */

/**
 * Attribute values are a closed union so equality is type-aware:
 * the string "5" never equals the number 5.
 */
export type AttributeValue = string | number | boolean;

export type Attributes = Readonly<Record<string, AttributeValue>>;

/**
 * A node in the hierarchy. Built once at load time and never mutated.
 */
export interface Element {
  readonly path: string;
  readonly name: string;
  readonly type: string;
  readonly attributes: Attributes;
  readonly children: readonly Element[];
  readonly parent: Element | null;
  /** Levels below the graph root (root = 0) */
  readonly depth: number;
  /** Lies in a subtree marked by the external segment name */
  readonly external: boolean;
}

/**
 * A directed edge between two element paths.
 */
export interface Association {
  readonly from: string;
  readonly to: string;
  readonly type: string;
  readonly attributes: Attributes;
}

// ============================================================================
// Loader documents - what a GraphLoader hands to the builder
// ============================================================================

export interface ElementSpec {
  name: string;
  type: string;
  attributes?: Record<string, AttributeValue>;
  children?: ElementSpec[];
}

export interface AssociationSpec {
  from: string;
  to: string;
  type: string;
  attributes?: Record<string, AttributeValue>;
}

export interface GraphDocument {
  root: ElementSpec;
  associations: AssociationSpec[];
}

// ============================================================================
// Views - the stable field names callers see
// ============================================================================

export interface ElementView {
  path: string;
  name: string;
  type: string;
  attributes: Record<string, AttributeValue>;
  parentPath: string | null;
  childPaths: string[];
}

export interface AssociationView {
  from: string;
  to: string;
  type: string;
  attributes: Record<string, AttributeValue>;
}

export interface ModelInfo {
  id: string;
  sourceRef: string;
  loadedAt: string;
  elementCount: number;
  associationCount: number;
  rootPath: string;
  loadMs: number;
}

// ============================================================================
// Query results
// ============================================================================

export type PatternKind = "regex" | "glob";

export type ChainDirection = "incoming" | "outgoing";

export const CHAIN_DIRECTIONS: readonly ChainDirection[] = ["incoming", "outgoing"];

export function isChainDirection(value: string): value is ChainDirection {
  return value === "incoming" || value === "outgoing";
}

/**
 * An association classified by subtree analysis. `attributedFrom` and
 * `attributedTo` name the analyzed element an inside endpoint is attributed
 * to (the endpoint itself, or its nearest ancestor within maxDepth);
 * they are null for endpoints outside the scope.
 */
export interface ClassifiedAssociation extends AssociationView {
  attributedFrom: string | null;
  attributedTo: string | null;
}

export interface SubtreeDependencies {
  scopePath: string;
  includeExternal: boolean;
  maxDepth: number | null;
  elements: ElementView[];
  internal: ClassifiedAssociation[];
  incoming: ClassifiedAssociation[];
  outgoing: ClassifiedAssociation[];
}

export interface ChainEntry {
  element: ElementView;
  /** The association that first reached this element; null at depth 0 */
  via: AssociationView | null;
}

export interface ChainLevel {
  depth: number;
  entries: ChainEntry[];
}

export interface DependencyChain {
  startPath: string;
  direction: ChainDirection;
  maxDepth: number | null;
  levels: ChainLevel[];
  visitedCount: number;
  /** The depth bound stopped the walk while unvisited neighbours remained */
  truncated: boolean;
}

export interface OverviewNode {
  path: string;
  name: string;
  type: string;
  depth: number;
  childCount?: number;
  incomingCount?: number;
  outgoingCount?: number;
  descendantCount?: number;
  descendantTypes?: Record<string, number>;
  children?: OverviewNode[];
  /** Direct children left unexpanded at the depth boundary */
  hasMoreChildren?: number;
}

export interface Overview {
  scopePath: string;
  /** null when unbounded */
  maxDepth: number | null;
  root: OverviewNode;
  summary: {
    totalElements: number;
    visitedElements: number;
    depthCounts: Record<string, number>;
    typeDistribution: Record<string, number>;
  };
}

export type ElementLookup =
  | { found: true; element: ElementView }
  | { found: false; error: string };

export interface MultipleElements {
  /** Distinct paths requested; repeated paths are looked up once */
  requestedCount: number;
  foundCount: number;
  elements: Record<string, ElementLookup>;
  notFound: string[];
}

// Re-export Result from core
export type { Result } from "@hierograph/core";
export { Ok, Err } from "@hierograph/core";
