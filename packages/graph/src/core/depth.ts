import { Err, Ok, type Result } from "./model.js";
import { invalidArgument, type GraphError } from "./errors.js";

/**
 * Normalize a caller-supplied depth bound.
 * Absent or infinite means unbounded (null); zero, negative and fractional
 * bounds degrade to the nearest non-negative integer; NaN is rejected.
 */
export function normalizeDepth(maxDepth: number | undefined): Result<number | null, GraphError> {
  if (maxDepth === undefined || maxDepth === Number.POSITIVE_INFINITY) {
    return Ok(null);
  }
  if (Number.isNaN(maxDepth)) {
    return Err(invalidArgument("maxDepth must be a number"));
  }
  return Ok(Math.max(0, Math.floor(maxDepth)));
}
