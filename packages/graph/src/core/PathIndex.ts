/**
 * Path index over an element hierarchy.
 * Built once at load time by an iterative pre-order walk; O(1) path lookup
 * and O(k) scope enumeration from the pre-order array.
 */

import type { Element } from "./model.js";
import { Err, Ok, type Result } from "./model.js";
import { scopeNotFound, type GraphError } from "./errors.js";

/**
 * True when `path` is `scopePath` itself or lies below it.
 * The empty root path contains every path.
 */
export function isWithin(path: string, scopePath: string): boolean {
  if (path === scopePath) return true;
  return path.startsWith(scopePath + "/");
}

export class PathIndex {
  // Elements in pre-order: parent before children, children in declared order
  private readonly ordered: Element[] = [];
  private readonly positions = new Map<string, number>();
  // Exclusive end of each element's subtree in `ordered`
  private readonly subtreeEnds: number[] = [];
  // Sorted pre-order positions per element type
  private readonly positionsByType = new Map<string, number[]>();

  constructor(root: Element) {
    const stack: Element[] = [root];
    while (stack.length > 0) {
      const element = stack.pop();
      if (element === undefined) break;

      const position = this.ordered.length;
      this.ordered.push(element);
      this.positions.set(element.path, position);

      let typed = this.positionsByType.get(element.type);
      if (!typed) {
        typed = [];
        this.positionsByType.set(element.type, typed);
      }
      typed.push(position);

      for (let i = element.children.length - 1; i >= 0; i--) {
        stack.push(element.children[i]);
      }
    }

    // A subtree ends where the next element at the same or a shallower depth starts
    const open: number[] = [];
    this.subtreeEnds = new Array<number>(this.ordered.length).fill(this.ordered.length);
    for (let position = 0; position < this.ordered.length; position++) {
      const depth = this.ordered[position].depth;
      while (open.length > 0 && this.ordered[open[open.length - 1]].depth >= depth) {
        const closed = open.pop();
        if (closed !== undefined) this.subtreeEnds[closed] = position;
      }
      open.push(position);
    }
  }

  get size(): number {
    return this.ordered.length;
  }

  resolve(path: string): Element | undefined {
    const position = this.positions.get(path);
    return position === undefined ? undefined : this.ordered[position];
  }

  /**
   * The scope element followed by all its descendants, in pre-order.
   * Without a scope path the whole graph is the scope.
   */
  elementsUnderScope(scopePath?: string): Result<Element[], GraphError> {
    if (scopePath === undefined) {
      return Ok(this.ordered.slice());
    }
    const position = this.positions.get(scopePath);
    if (position === undefined) {
      return Err(scopeNotFound(scopePath));
    }
    return Ok(this.ordered.slice(position, this.subtreeEnds[position]));
  }

  /**
   * Number of descendants of an indexed element (the element excluded).
   */
  descendantCount(element: Element): number {
    const position = this.positions.get(element.path);
    if (position === undefined) return 0;
    return this.subtreeEnds[position] - position - 1;
  }

  /**
   * Descendants of an indexed element counted by type, computed from
   * per-type position lists without visiting the descendants.
   */
  descendantTypeCounts(element: Element): Record<string, number> {
    const counts = new Map<string, number>();
    const position = this.positions.get(element.path);
    if (position !== undefined && position + 1 < this.subtreeEnds[position]) {
      const start = position + 1;
      const end = this.subtreeEnds[position];
      for (const [type, typed] of this.positionsByType) {
        const count = lowerBound(typed, end) - lowerBound(typed, start);
        if (count > 0) counts.set(type, count);
      }
    }
    // Types are open-ended; fromEntries keeps "__proto__" as an own key
    return Object.fromEntries(counts);
  }
}

/**
 * First index in a sorted array whose value is >= target.
 */
function lowerBound(sorted: readonly number[], target: number): number {
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (sorted[mid] < target) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}
