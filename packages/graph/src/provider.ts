import type { ProcessGraph } from "./types.js";
import { NotFoundError } from "./errors.js";
import { importDocument } from "./export.js";

/**
 * Supplies graph snapshots to the engine. Implementations own all I/O,
 * retries and caching; the engine only calls `fetchGraph`.
 */
export interface GraphDataProvider {
  /** Rejects with `NotFoundError` when the process does not exist. */
  fetchGraph(processId: string): Promise<ProcessGraph>;
}

/**
 * Provider over export documents held in memory, keyed by process id.
 * Documents are validated when added.
 */
export class InMemoryGraphProvider implements GraphDataProvider {
  private readonly graphs = new Map<string, ProcessGraph>();

  constructor(documents: ReadonlyArray<unknown> = []) {
    for (const doc of documents) this.add(doc);
  }

  /** Import a document and store its graph under its process id. */
  add(document: unknown): ProcessGraph {
    const { process, graph } = importDocument(document);
    this.graphs.set(process.id, graph);
    return graph;
  }

  processIds(): string[] {
    return [...this.graphs.keys()];
  }

  async fetchGraph(processId: string): Promise<ProcessGraph> {
    const graph = this.graphs.get(processId);
    if (graph === undefined) throw new NotFoundError(processId);
    return graph;
  }
}
