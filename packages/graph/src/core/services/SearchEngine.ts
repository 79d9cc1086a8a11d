/**
 * Element search by name pattern, type and attribute values.
 * Candidates come from the path index in pre-order, so results are in
 * hierarchy order. Arguments are validated before any candidate is examined.
 */

import type { AttributeValue, Element, PatternKind } from "../model.js";
import { Err, Ok, type Result } from "../model.js";
import type { Graph } from "../Graph.js";
import { compileNamePattern } from "../patterns.js";
import { invalidArgument, type GraphError } from "../errors.js";

export interface ScopeOptions {
  scopePath?: string;
}

export interface NameSearchOptions extends ScopeOptions {
  patternKind?: PatternKind;
  /** Exact element type to keep */
  type?: string;
}

export function searchByName(
  graph: Graph,
  pattern: string,
  options: NameSearchOptions = {}
): Result<Element[], GraphError> {
  const compiled = compileNamePattern(pattern, options.patternKind ?? "regex");
  if (!compiled.ok) return compiled;

  const regex = compiled.value;
  const { type } = options;
  return filterScope(
    graph,
    options.scopePath,
    (element) => regex.test(element.name) && (type === undefined || element.type === type)
  );
}

export function searchByType(
  graph: Graph,
  type: string,
  options: ScopeOptions = {}
): Result<Element[], GraphError> {
  if (type.length === 0) {
    return Err(invalidArgument("Element type cannot be empty"));
  }
  return filterScope(graph, options.scopePath, (element) => element.type === type);
}

/**
 * Elements carrying every filter attribute with a strictly equal value.
 */
export function searchByAttributes(
  graph: Graph,
  filters: Readonly<Record<string, AttributeValue>>,
  options: ScopeOptions = {}
): Result<Element[], GraphError> {
  const expected = Object.entries(filters);
  if (expected.length === 0) {
    return Err(invalidArgument("At least one attribute filter is required"));
  }

  return filterScope(graph, options.scopePath, (element) =>
    expected.every(
      ([name, value]) => Object.hasOwn(element.attributes, name) && element.attributes[name] === value
    )
  );
}

function filterScope(
  graph: Graph,
  scopePath: string | undefined,
  predicate: (element: Element) => boolean
): Result<Element[], GraphError> {
  const scope = graph.index.elementsUnderScope(scopePath);
  if (!scope.ok) return scope;
  return Ok(scope.value.filter(predicate));
}
