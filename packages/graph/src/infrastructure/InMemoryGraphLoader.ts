import type { GraphDocument } from "../core/model.js";
import type { GraphLoader } from "../core/ports/GraphLoader.js";

/**
 * Serves documents registered under a name. For tests and for embedding
 * graphs built in code.
 */
export class InMemoryGraphLoader implements GraphLoader {
  private readonly documents = new Map<string, GraphDocument>();

  register(name: string, document: GraphDocument): this {
    this.documents.set(name, document);
    return this;
  }

  async load(sourceRef: string, signal: AbortSignal): Promise<GraphDocument> {
    signal.throwIfAborted();
    const document = this.documents.get(sourceRef);
    if (!document) {
      throw new Error(`No model registered as "${sourceRef}"`);
    }
    return document;
  }
}
