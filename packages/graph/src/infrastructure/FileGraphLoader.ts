import { readFile } from "node:fs/promises";
import { gunzip } from "node:zlib";
import { promisify } from "node:util";

import type { GraphDocument } from "../core/model.js";
import type { GraphLoader } from "../core/ports/GraphLoader.js";
import { modelFileToDocument, parseModelFile } from "./modelFile.js";

const gunzipAsync = promisify(gunzip);

export const SUPPORTED_EXTENSIONS = [".json", ".json.gz"] as const;

/**
 * Loads model files from disk: plain JSON or gzip-compressed JSON.
 */
export class FileGraphLoader implements GraphLoader {
  async load(sourceRef: string, signal: AbortSignal): Promise<GraphDocument> {
    const compressed = sourceRef.endsWith(".json.gz");
    if (!compressed && !sourceRef.endsWith(".json")) {
      throw new Error(
        `Unsupported model format: ${sourceRef} (expected ${SUPPORTED_EXTENSIONS.join(" or ")})`
      );
    }

    const bytes = await readFile(sourceRef, { signal });
    const text = compressed ? (await gunzipAsync(bytes)).toString("utf8") : bytes.toString("utf8");
    signal.throwIfAborted();

    const raw: unknown = JSON.parse(text);
    const file = parseModelFile(raw);
    if (!file.ok) throw new Error(file.error);

    const document = modelFileToDocument(file.value);
    if (!document.ok) throw new Error(document.error);
    return document.value;
  }
}
