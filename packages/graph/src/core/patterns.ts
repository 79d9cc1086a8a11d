/**
 * Name pattern compilation for element search.
 * Patterns compile up front so an invalid one fails before any traversal.
 */

import type { PatternKind } from "./model.js";
import { Err, Ok, type Result } from "./model.js";
import { invalidPattern, type GraphError } from "./errors.js";

/**
 * Compile a name pattern.
 * - regex: unanchored search, like RegExp.test
 * - glob: `*`, `?` and `[...]` classes, anchored to the whole name
 */
export function compileNamePattern(pattern: string, kind: PatternKind): Result<RegExp, GraphError> {
  if (pattern.length === 0) {
    return Err(invalidPattern(pattern, "pattern cannot be empty"));
  }

  let source = pattern;
  if (kind === "glob") {
    const converted = globToRegExpSource(pattern);
    if (!converted.ok) return converted;
    source = converted.value;
  }

  try {
    return Ok(new RegExp(source));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return Err(invalidPattern(pattern, reason));
  }
}

function globToRegExpSource(glob: string): Result<string, GraphError> {
  let source = "^";
  for (let i = 0; i < glob.length; i++) {
    const char = glob[i];
    if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else if (char === "[") {
      // `!` negates; a `]` right after the opening (or after `!`) is a member
      const negated = glob[i + 1] === "!";
      const first = negated ? i + 2 : i + 1;
      const close = glob.indexOf("]", glob[first] === "]" ? first + 1 : first);
      if (close === -1) {
        return Err(invalidPattern(glob, `unterminated character class at position ${i}`));
      }
      const members = glob.slice(first, close).replace(/[\\\]^]/g, "\\$&");
      source += `[${negated ? "^" : ""}${members}]`;
      i = close;
    } else {
      source += char.replace(/[.+^${}()|\\\]]/g, "\\$&");
    }
  }
  return Ok(source + "$");
}
