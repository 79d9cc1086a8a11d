import * as z from "zod/v4";

export const ModelIdSchema = z.string().describe("Model id returned by model_load");

export const ElementPathSchema = z.string().describe("Element path, e.g. /project/src/main.ts");

export const ScopePathSchema = z
  .string()
  .optional()
  .describe("Limit the query to this element and its descendants (default: whole model)");

export const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const DirectionSchema = z
  .string()
  .describe('"outgoing" follows from -> to, "incoming" follows to -> from');

export const PatternKindSchema = z.enum(["regex", "glob"]);

export const LimitSchema = z.number().int().positive().optional().describe("Maximum elements to return");
