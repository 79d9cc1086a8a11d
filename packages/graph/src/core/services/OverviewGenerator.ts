/**
 * Depth-bounded hierarchical overview.
 * One iterative walk from the scope element; nothing deeper than maxDepth is
 * visited. Descendant counts come from the path index, so nodes at the
 * boundary summarize their unexpanded subtree without walking it.
 */

import type { Element, Overview, OverviewNode } from "../model.js";
import { Err, Ok, type Result } from "../model.js";
import type { Graph } from "../Graph.js";
import { normalizeDepth } from "../depth.js";
import { scopeNotFound, type GraphError } from "../errors.js";

export const DEFAULT_OVERVIEW_DEPTH = 3;

export interface OverviewOptions {
  scopePath?: string;
  maxDepth?: number;
  includeCounts?: boolean;
}

interface PendingNode {
  element: Element;
  depth: number;
  siblings: OverviewNode[] | null;
}

export function generateOverview(graph: Graph, options: OverviewOptions = {}): Result<Overview, GraphError> {
  const includeCounts = options.includeCounts ?? true;
  const depth = normalizeDepth(options.maxDepth ?? DEFAULT_OVERVIEW_DEPTH);
  if (!depth.ok) return depth;
  const maxDepth = depth.value ?? Number.POSITIVE_INFINITY;

  const scopeElement = options.scopePath === undefined ? graph.root : graph.resolve(options.scopePath);
  if (!scopeElement) return Err(scopeNotFound(options.scopePath ?? ""));

  const depthCounts = new Map<number, number>();
  const typeDistribution = new Map<string, number>();
  let visitedElements = 0;
  let root: OverviewNode | null = null;

  const stack: PendingNode[] = [{ element: scopeElement, depth: 0, siblings: null }];
  while (stack.length > 0) {
    const pending = stack.pop();
    if (pending === undefined) break;
    const { element, depth: level, siblings } = pending;

    visitedElements++;
    depthCounts.set(level, (depthCounts.get(level) ?? 0) + 1);
    const type = element.type || "unknown";
    typeDistribution.set(type, (typeDistribution.get(type) ?? 0) + 1);

    const node: OverviewNode = {
      path: element.path,
      name: element.name,
      type,
      depth: level,
    };

    if (includeCounts) {
      node.childCount = element.children.length;
      node.incomingCount = graph.incomingOf(element.path).length;
      node.outgoingCount = graph.outgoingOf(element.path).length;
      node.descendantCount = graph.index.descendantCount(element);
      node.descendantTypes = graph.index.descendantTypeCounts(element);
    }

    if (siblings === null) {
      root = node;
    } else {
      siblings.push(node);
    }

    if (element.children.length === 0) continue;

    if (level < maxDepth) {
      const children: OverviewNode[] = [];
      node.children = children;
      // Reverse push so children pop in declared order
      for (let i = element.children.length - 1; i >= 0; i--) {
        stack.push({ element: element.children[i], depth: level + 1, siblings: children });
      }
    } else {
      node.hasMoreChildren = element.children.length;
    }
  }

  if (root === null) {
    return Err(scopeNotFound(options.scopePath ?? ""));
  }

  return Ok({
    scopePath: scopeElement.path,
    maxDepth: depth.value,
    root,
    summary: {
      totalElements: graph.index.descendantCount(scopeElement) + 1,
      visitedElements,
      depthCounts: Object.fromEntries(depthCounts),
      typeDistribution: Object.fromEntries(typeDistribution),
    },
  });
}
