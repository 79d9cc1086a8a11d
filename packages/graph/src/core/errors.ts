/**
 * Typed errors for graph loading and queries.
 */

import { CHAIN_DIRECTIONS } from "./model.js";

export type GraphErrorCode =
  | "LoadError"
  | "NotLoaded"
  | "ElementNotFound"
  | "InvalidPattern"
  | "InvalidDirection"
  | "InvalidArgument"
  | "NotFound"
  /** A loaded graph broke an invariant that load-time validation guarantees */
  | "InternalError";

export class GraphError extends Error {
  override readonly name = "GraphError";

  constructor(
    readonly code: GraphErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  /** Defects are triaged separately from bad caller input */
  get isDefect(): boolean {
    return this.code === "InternalError";
  }
}

export const loadError = (message: string, cause?: unknown): GraphError =>
  new GraphError("LoadError", message, { cause });

export const notLoaded = (id: string): GraphError =>
  new GraphError("NotLoaded", `Model not loaded: ${id}`);

export const elementNotFound = (path: string): GraphError =>
  new GraphError("ElementNotFound", `Element not found: ${path}`);

export const scopeNotFound = (path: string): GraphError =>
  new GraphError("NotFound", `Scope path not found: ${path}`);

export const invalidPattern = (pattern: string, reason: string): GraphError =>
  new GraphError("InvalidPattern", `Invalid pattern "${pattern}": ${reason}`);

export const invalidDirection = (direction: string): GraphError =>
  new GraphError(
    "InvalidDirection",
    `Invalid direction "${direction}". Must be one of: ${CHAIN_DIRECTIONS.join(", ")}`
  );

export const invalidArgument = (message: string): GraphError =>
  new GraphError("InvalidArgument", message);

export const internalError = (message: string): GraphError =>
  new GraphError("InternalError", message);
