/**
 * Dependency traversal over associations: subtree classification and
 * breadth-first dependency chains. Both walk explicit worklists; association
 * graphs may be cyclic, so every walk keeps a visited set keyed by path.
 */

import type {
  Association,
  ChainDirection,
  ChainEntry,
  ChainLevel,
  ClassifiedAssociation,
  DependencyChain,
  Element,
  SubtreeDependencies,
} from "../model.js";
import { Err, Ok, isChainDirection, type Result } from "../model.js";
import type { Graph } from "../Graph.js";
import { isWithin } from "../PathIndex.js";
import { normalizeDepth } from "../depth.js";
import { toAssociationView, toElementView } from "../views.js";
import { elementNotFound, internalError, invalidDirection, type GraphError } from "../errors.js";

export interface SubtreeOptions {
  /** Keep associations whose outside endpoint is external (default true) */
  includeExternal?: boolean;
  /** Hierarchy levels below the scope element to analyze individually */
  maxDepth?: number;
}

/**
 * Partition every association touching the scope into internal, incoming
 * and outgoing. Each association lands in exactly one set.
 */
export function analyzeSubtree(
  graph: Graph,
  scopePath: string,
  options: SubtreeOptions = {}
): Result<SubtreeDependencies, GraphError> {
  const includeExternal = options.includeExternal ?? true;
  const depth = normalizeDepth(options.maxDepth);
  if (!depth.ok) return depth;
  const maxDepth = depth.value;

  const scopeElement = graph.resolve(scopePath);
  if (!scopeElement) return Err(elementNotFound(scopePath));

  const scope = graph.index.elementsUnderScope(scopePath);
  if (!scope.ok) return Err(internalError(`Path index lost scope ${scopePath}`));

  const baseDepth = scopeElement.depth;
  const withinDepth = (element: Element): boolean =>
    maxDepth === null || element.depth - baseDepth <= maxDepth;

  // Deeper elements are reported as their nearest analyzed ancestor
  const attribute = (element: Element): string => {
    let current = element;
    while (!withinDepth(current) && current.parent !== null) {
      current = current.parent;
    }
    return current.path;
  };

  const result: SubtreeDependencies = {
    scopePath,
    includeExternal,
    maxDepth,
    elements: [],
    internal: [],
    incoming: [],
    outgoing: [],
  };

  for (const element of scope.value) {
    if (withinDepth(element)) {
      result.elements.push(toElementView(element));
    }

    for (const association of graph.outgoingOf(element.path)) {
      const target = graph.resolve(association.to);
      if (!target) return Err(danglingEndpoint(association, association.to));

      if (isWithin(target.path, scopePath)) {
        result.internal.push(classify(association, attribute(element), attribute(target)));
      } else if (includeExternal || !target.external) {
        result.outgoing.push(classify(association, attribute(element), null));
      }
    }

    for (const association of graph.incomingOf(element.path)) {
      const source = graph.resolve(association.from);
      if (!source) return Err(danglingEndpoint(association, association.from));

      // Inside sources were already counted as internal from their outgoing side
      if (isWithin(source.path, scopePath)) continue;
      if (includeExternal || !source.external) {
        result.incoming.push(classify(association, null, attribute(element)));
      }
    }
  }

  return Ok(result);
}

/**
 * Breadth-first dependency chain from a start element.
 * Level 0 holds the start element; each later level holds the elements first
 * reached at that many hops, sorted by path, with the association that
 * reached them. No path appears twice across levels.
 */
export function dependencyChain(
  graph: Graph,
  startPath: string,
  direction: string,
  maxDepth?: number
): Result<DependencyChain, GraphError> {
  if (!isChainDirection(direction)) {
    return Err(invalidDirection(direction));
  }
  const depth = normalizeDepth(maxDepth);
  if (!depth.ok) return depth;
  const limit = depth.value;

  const start = graph.resolve(startPath);
  if (!start) return Err(elementNotFound(startPath));

  const levels: ChainLevel[] = [{ depth: 0, entries: [{ element: toElementView(start), via: null }] }];
  const visited = new Set<string>([start.path]);
  let frontier: Element[] = [start];
  let truncated = false;

  while (frontier.length > 0) {
    const reached = new Map<string, { element: Element; via: Association }>();
    for (const element of frontier) {
      for (const association of neighbours(graph, element, direction)) {
        const nextPath = direction === "outgoing" ? association.to : association.from;
        if (visited.has(nextPath) || reached.has(nextPath)) continue;

        const next = graph.resolve(nextPath);
        if (!next) return Err(danglingEndpoint(association, nextPath));
        reached.set(nextPath, { element: next, via: association });
      }
    }

    if (reached.size === 0) break;
    if (limit !== null && levels.length > limit) {
      truncated = true;
      break;
    }

    const ordered = Array.from(reached.values()).sort((a, b) => comparePaths(a.element.path, b.element.path));
    const entries: ChainEntry[] = [];
    for (const { element, via } of ordered) {
      visited.add(element.path);
      entries.push({ element: toElementView(element), via: toAssociationView(via) });
    }
    levels.push({ depth: levels.length, entries });
    frontier = ordered.map((entry) => entry.element);
  }

  return Ok({
    startPath: start.path,
    direction,
    maxDepth: limit,
    levels,
    visitedCount: visited.size,
    truncated,
  });
}

function neighbours(graph: Graph, element: Element, direction: ChainDirection): readonly Association[] {
  return direction === "outgoing" ? graph.outgoingOf(element.path) : graph.incomingOf(element.path);
}

function classify(
  association: Association,
  attributedFrom: string | null,
  attributedTo: string | null
): ClassifiedAssociation {
  return { ...toAssociationView(association), attributedFrom, attributedTo };
}

function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function danglingEndpoint(association: Association, missing: string): GraphError {
  return internalError(
    `Association ${association.from} -> ${association.to} (${association.type}) references missing element ${missing}`
  );
}
