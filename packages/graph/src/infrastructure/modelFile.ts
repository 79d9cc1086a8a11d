/**
 * The on-disk model format: a flat element list in parent-before-child
 * order plus an association list. Flat so that neither parsing nor
 * validation recurses on deep hierarchies.
 */

import * as z from "zod/v4";

import type { ElementSpec, GraphDocument } from "../core/model.js";
import { Err, Ok, type Result } from "../core/model.js";

const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean()]);
const AttributesSchema = z.record(z.string(), AttributeValueSchema);

export const ModelFileSchema = z.object({
  version: z.literal(1),
  elements: z
    .array(
      z.object({
        path: z.string(),
        type: z.string(),
        attributes: AttributesSchema.optional(),
      })
    )
    .min(1, "a model needs at least a root element"),
  associations: z
    .array(
      z.object({
        from: z.string(),
        to: z.string(),
        type: z.string(),
        attributes: AttributesSchema.optional(),
      })
    )
    .default([]),
});

export type ModelFile = z.infer<typeof ModelFileSchema>;

const ROOT_PATH = /^(\/[^/]+)?$/;

/**
 * Validate raw JSON against the model file schema.
 */
export function parseModelFile(raw: unknown): Result<ModelFile, string> {
  const parsed = ModelFileSchema.safeParse(raw);
  if (parsed.success) return Ok(parsed.data);

  const issues = parsed.error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`);
  return Err(`Invalid model file: ${issues.join("; ")}`);
}

/**
 * Rebuild the element tree from the flat list. The first element is the
 * root; every other element's parent must be listed before it.
 */
export function modelFileToDocument(file: ModelFile): Result<GraphDocument, string> {
  const [first, ...rest] = file.elements;
  if (!ROOT_PATH.test(first.path)) {
    return Err(`Root element path must be empty or a single segment, got "${first.path}"`);
  }

  const root: ElementSpec = {
    name: first.path.slice(1),
    type: first.type,
    attributes: first.attributes,
    children: [],
  };
  const byPath = new Map<string, ElementSpec>([[first.path, root]]);

  for (const entry of rest) {
    if (byPath.has(entry.path)) {
      return Err(`Duplicate element path: ${entry.path}`);
    }
    const cut = entry.path.lastIndexOf("/");
    const parent = cut === -1 ? undefined : byPath.get(entry.path.slice(0, cut));
    if (!parent) {
      return Err(`Element ${entry.path} is listed before its parent, or its parent is missing`);
    }

    const spec: ElementSpec = {
      name: entry.path.slice(cut + 1),
      type: entry.type,
      attributes: entry.attributes,
      children: [],
    };
    parent.children?.push(spec);
    byPath.set(entry.path, spec);
  }

  return Ok({ root, associations: file.associations });
}
