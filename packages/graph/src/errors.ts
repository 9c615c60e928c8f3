/**
 * Error types raised by the process graph engine.
 *
 * Only conditions that abort a call are thrown. Non-fatal signals
 * (path limits, degenerate layouts) are returned as data with the result.
 */

export type ProcessGraphErrorCode =
  | "validation"
  | "unknown-node"
  | "no-path"
  | "path-limit"
  | "not-found";

/**
 * Base class for all engine errors.
 */
export class ProcessGraphError extends Error {
  constructor(
    message: string,
    public readonly code: ProcessGraphErrorCode
  ) {
    super(message);
    this.name = "ProcessGraphError";
  }
}

/** One problem found while validating graph input. `path` locates it, e.g. `edges[2].to`. */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Thrown when graph input is malformed. No graph is constructed.
 */
export class ValidationError extends ProcessGraphError {
  constructor(public readonly issues: ReadonlyArray<ValidationIssue>) {
    super(formatIssues(issues), "validation");
    this.name = "ValidationError";
  }
}

function formatIssues(issues: ReadonlyArray<ValidationIssue>): string {
  if (issues.length === 1) {
    return `Invalid process graph: ${issues[0].path}: ${issues[0].message}`;
  }
  const lines = issues.map((issue) => `  ${issue.path}: ${issue.message}`);
  return `Invalid process graph (${issues.length} issues):\n${lines.join("\n")}`;
}

/**
 * Thrown when a lookup names a node the graph does not contain.
 */
export class UnknownNodeError extends ProcessGraphError {
  constructor(public readonly nodeId: string) {
    super(`Unknown node "${nodeId}"`, "unknown-node");
    this.name = "UnknownNodeError";
  }
}

/**
 * Thrown by the critical path calculator when no start→end path exists.
 */
export class NoPathError extends ProcessGraphError {
  constructor(
    public readonly startIds: ReadonlyArray<string>,
    public readonly endIds: ReadonlyArray<string>
  ) {
    super(describeNoPath(startIds, endIds), "no-path");
    this.name = "NoPathError";
  }
}

function describeNoPath(startIds: ReadonlyArray<string>, endIds: ReadonlyArray<string>): string {
  if (startIds.length === 0) return "No path: the graph has no start node";
  if (endIds.length === 0) return "No path: the graph has no end node";
  return `No path from [${startIds.join(", ")}] to [${endIds.join(", ")}]`;
}

/**
 * Thrown by the critical path calculator when an end node is reachable but
 * every path to it is longer than the search bound allowed.
 */
export class PathLimitError extends ProcessGraphError {
  constructor(
    public readonly maxPathLength: number,
    public readonly startIds: ReadonlyArray<string>,
    public readonly endIds: ReadonlyArray<string>
  ) {
    super(
      `No path from [${startIds.join(", ")}] to [${endIds.join(", ")}] within ${maxPathLength} nodes`,
      "path-limit"
    );
    this.name = "PathLimitError";
  }
}

/**
 * Raised by graph data providers when a process does not exist.
 */
export class NotFoundError extends ProcessGraphError {
  constructor(public readonly processId: string) {
    super(`Process "${processId}" not found`, "not-found");
    this.name = "NotFoundError";
  }
}
