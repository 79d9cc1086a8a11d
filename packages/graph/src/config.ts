/**
 * Server configuration from environment variables.
 */

import { delimiter } from "node:path";
import * as z from "zod/v4";

import { DEFAULT_EXTERNAL_SEGMENT } from "./core/GraphBuilder.js";
import { DEFAULT_LOAD_TIMEOUT_MS } from "./core/services/ModelCache.js";

export const DEFAULT_SEARCH_LIMIT = 200;

export interface GraphServerConfig {
  loadTimeoutMs: number;
  externalSegment: string;
  /** Model files loaded at startup */
  preload: string[];
  /** Default result cap of the search tools */
  searchLimit: number;
}

const EnvSchema = z.object({
  HIEROGRAPH_LOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_LOAD_TIMEOUT_MS),
  HIEROGRAPH_EXTERNAL_SEGMENT: z
    .string()
    .min(1)
    .refine((value) => !value.includes("/"), "must be a single path segment")
    .default(DEFAULT_EXTERNAL_SEGMENT),
  HIEROGRAPH_PRELOAD: z.string().default(""),
  HIEROGRAPH_SEARCH_LIMIT: z.coerce.number().int().positive().default(DEFAULT_SEARCH_LIMIT),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GraphServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.map(String).join(".")}: ${issue.message}`
    );
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const values = parsed.data;
  return {
    loadTimeoutMs: values.HIEROGRAPH_LOAD_TIMEOUT_MS,
    externalSegment: values.HIEROGRAPH_EXTERNAL_SEGMENT,
    preload: values.HIEROGRAPH_PRELOAD.split(delimiter)
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0),
    searchLimit: values.HIEROGRAPH_SEARCH_LIMIT,
  };
}
