/**
 * Shared response formatting for graph tools.
 */

import { resultToStructuredResponse, type ToolResponse } from "@hierograph/core";

import type { AssociationView, ElementView, Result } from "../core/model.js";
import type { GraphError } from "../core/errors.js";

const MAX_TEXT_LINES = 50;

/**
 * Convert a query Result to a tool response. Defects are logged separately
 * from caller errors so they are not mistaken for bad input.
 */
export function respond<T, S extends Record<string, unknown>>(
  tool: string,
  result: Result<T, GraphError>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse {
  if (!result.ok && result.error.isDefect) {
    console.error(`[hierograph] Defect in ${tool}: ${result.error.message}`);
  }
  return resultToStructuredResponse(result, formatter);
}

export function elementLine(element: ElementView): string {
  return `- **${element.path || "/"}** (${element.type || "unknown"})`;
}

export function associationLine(association: AssociationView): string {
  return `- ${association.from} → ${association.to} [${association.type}]`;
}

/**
 * Render a capped bullet list with an overflow marker.
 */
export function listLines<T>(items: readonly T[], render: (item: T) => string): string[] {
  const lines = items.slice(0, MAX_TEXT_LINES).map(render);
  if (items.length > MAX_TEXT_LINES) {
    lines.push(`  ... and ${items.length - MAX_TEXT_LINES} more`);
  }
  return lines;
}

export interface LimitedElements extends Record<string, unknown> {
  elements: ElementView[];
  count: number;
  total: number;
  truncated: boolean;
}

export function limitElements(elements: ElementView[], limit: number): LimitedElements {
  const kept = elements.slice(0, limit);
  return {
    elements: kept,
    count: kept.length,
    total: elements.length,
    truncated: elements.length > kept.length,
  };
}

export function formatElementMatches(heading: string, matches: LimitedElements): string {
  if (matches.total === 0) {
    return `No elements found ${heading}`;
  }
  const lines = [`## Found ${matches.total} element(s) ${heading}`, ""];
  lines.push(...listLines(matches.elements, elementLine));
  if (matches.truncated) {
    lines.push("", `Showing ${matches.count} of ${matches.total}; raise limit or narrow scope_path for more.`);
  }
  return lines.join("\n");
}
