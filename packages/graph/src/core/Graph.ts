/**
 * An immutable, indexed dependency graph.
 */

import type { Association, Element } from "./model.js";
import { PathIndex } from "./PathIndex.js";

const NO_ASSOCIATIONS: readonly Association[] = [];

export class Graph {
  readonly index: PathIndex;

  // Adjacency by element path, in association declaration order
  private readonly outgoing = new Map<string, Association[]>();
  private readonly incoming = new Map<string, Association[]>();

  constructor(
    readonly root: Element,
    readonly associations: readonly Association[]
  ) {
    this.index = new PathIndex(root);

    for (const association of associations) {
      append(this.outgoing, association.from, association);
      append(this.incoming, association.to, association);
    }
  }

  get elementCount(): number {
    return this.index.size;
  }

  get associationCount(): number {
    return this.associations.length;
  }

  resolve(path: string): Element | undefined {
    return this.index.resolve(path);
  }

  outgoingOf(path: string): readonly Association[] {
    return this.outgoing.get(path) ?? NO_ASSOCIATIONS;
  }

  incomingOf(path: string): readonly Association[] {
    return this.incoming.get(path) ?? NO_ASSOCIATIONS;
  }
}

function append(map: Map<string, Association[]>, key: string, association: Association): void {
  const list = map.get(key);
  if (list) {
    list.push(association);
  } else {
    map.set(key, [association]);
  }
}
