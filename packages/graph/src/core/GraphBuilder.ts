/**
 * Builds a validated Graph from a loader document.
 * Rejects duplicate paths, hierarchy cycles, bad names and dangling
 * association endpoints; nothing partially valid is ever returned.
 */

import type { Association, AssociationSpec, Attributes, Element, ElementSpec, GraphDocument } from "./model.js";
import { Err, Ok, type Result } from "./model.js";
import { Graph } from "./Graph.js";
import { loadError, type GraphError } from "./errors.js";

export const DEFAULT_EXTERNAL_SEGMENT = "External";

export interface BuildOptions {
  /** Path segment that marks an external-dependency subtree */
  externalSegment?: string;
}

interface PendingElement {
  spec: ElementSpec;
  parent: BuiltElement | null;
}

type BuiltElement = Element & { readonly children: Element[] };

export function buildGraph(document: GraphDocument, options: BuildOptions = {}): Result<Graph, GraphError> {
  const externalSegment = options.externalSegment ?? DEFAULT_EXTERNAL_SEGMENT;
  const seenSpecs = new Set<ElementSpec>();
  const paths = new Set<string>();

  let root: BuiltElement | null = null;
  const stack: PendingElement[] = [{ spec: document.root, parent: null }];

  while (stack.length > 0) {
    const pending = stack.pop();
    if (pending === undefined) break;
    const { spec, parent } = pending;

    if (seenSpecs.has(spec)) {
      const where = parent ? parent.path || "/" : "root";
      return Err(loadError(`Hierarchy cycle or shared child "${spec.name}" under ${where}`));
    }
    seenSpecs.add(spec);

    if (parent !== null && (spec.name.length === 0 || spec.name.includes("/"))) {
      return Err(loadError(`Invalid element name "${spec.name}" under ${parent.path || "/"}`));
    }
    if (parent === null && spec.name.includes("/")) {
      return Err(loadError(`Invalid root name "${spec.name}"`));
    }

    const path = parent === null ? (spec.name ? `/${spec.name}` : "") : `${parent.path}/${spec.name}`;
    if (paths.has(path)) {
      return Err(loadError(`Duplicate element path: ${path}`));
    }
    paths.add(path);

    const element: BuiltElement = {
      path,
      name: spec.name,
      type: spec.type,
      attributes: freezeAttributes(spec.attributes),
      children: [],
      parent,
      depth: parent === null ? 0 : parent.depth + 1,
      external: (parent !== null && parent.external) || spec.name === externalSegment,
    };

    if (parent === null) {
      root = element;
    } else {
      parent.children.push(element);
    }

    const children = spec.children ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ spec: children[i], parent: element });
    }
  }

  if (root === null) {
    return Err(loadError("Document has no root element"));
  }

  const associations: Association[] = [];
  for (const spec of document.associations) {
    const checked = checkAssociation(spec, paths);
    if (!checked.ok) return checked;
    associations.push(checked.value);
  }

  return Ok(new Graph(root, associations));
}

function checkAssociation(spec: AssociationSpec, paths: ReadonlySet<string>): Result<Association, GraphError> {
  if (!paths.has(spec.from)) {
    return Err(loadError(`Association ${spec.from} -> ${spec.to} (${spec.type}): unknown source element`));
  }
  if (!paths.has(spec.to)) {
    return Err(loadError(`Association ${spec.from} -> ${spec.to} (${spec.type}): unknown target element`));
  }
  return Ok({
    from: spec.from,
    to: spec.to,
    type: spec.type,
    attributes: freezeAttributes(spec.attributes),
  });
}

function freezeAttributes(attributes: ElementSpec["attributes"]): Attributes {
  return Object.freeze({ ...(attributes ?? {}) });
}
