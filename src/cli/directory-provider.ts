import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { createLogger } from "@procflow/core";
import { NotFoundError, parseDocument, type GraphDataProvider, type ProcessGraph } from "@procflow/graph";

const log = createLogger("store");

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Serves export documents stored as `<processId>.json` in one directory.
 * Files are read and validated on every fetch.
 */
export class DirectoryGraphProvider implements GraphDataProvider {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  fileFor(processId: string): string {
    return path.join(this.directory, `${processId}.json`);
  }

  async fetchGraph(processId: string): Promise<ProcessGraph> {
    // ids never address files outside the store
    if (processId === "" || processId !== path.basename(processId) || processId.startsWith(".")) {
      throw new NotFoundError(processId);
    }

    const file = this.fileFor(processId);
    let text: string;
    try {
      text = await readFile(file, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) throw new NotFoundError(processId);
      throw error;
    }

    log.debug(`Loaded ${file}`);
    return parseDocument(text).graph;
  }
}
