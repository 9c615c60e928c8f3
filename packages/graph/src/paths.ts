import type { NodeKind, Path, PathEnumeration, PathLimitExceeded, ProcessGraph } from "./types.js";
import { getNode, nodesOfKind, successors } from "./graph.js";

export interface PathOptions {
  /** Kind of the nodes paths start from. Default `Start`. */
  readonly startKind?: NodeKind;
  /** Kind of the nodes paths end at. Default `End`. */
  readonly endKind?: NodeKind;
  /** Longest path, in nodes, the search may build. Default `2 × node count`. */
  readonly maxPathLength?: number;
}

/** Default bound on path length for a graph. */
export function defaultMaxPathLength(graph: ProcessGraph): number {
  return Math.max(1, 2 * graph.nodes.length);
}

/**
 * Enumerate every simple path from each start node to any end node.
 *
 * Depth-first from each start node in insertion order. The visited set
 * covers only the current path, so cycles terminate without hiding
 * alternative routes through the same node. Reaching an end node records the
 * path and backtracks. Parallel edges count once. When a path would grow
 * past `maxPathLength`, the search from that start node stops and a
 * `PathLimitExceeded` signal is returned beside the paths found so far.
 */
export function enumeratePaths(graph: ProcessGraph, options: PathOptions = {}): PathEnumeration {
  const startKind = options.startKind ?? "Start";
  const endKind = options.endKind ?? "End";
  const maxPathLength = options.maxPathLength ?? defaultMaxPathLength(graph);
  if (!Number.isInteger(maxPathLength) || maxPathLength < 1) {
    throw new RangeError(`maxPathLength must be a positive integer (got ${maxPathLength})`);
  }

  const paths: Path[] = [];
  const warnings: PathLimitExceeded[] = [];

  for (const startId of nodesOfKind(graph, startKind)) {
    const found = paths.length;
    const stack: string[] = [];
    const onPath = new Set<string>();
    let limitHit = false;

    const visit = (node: string): void => {
      if (limitHit) return;
      if (stack.length >= maxPathLength) {
        limitHit = true;
        return;
      }
      stack.push(node);
      onPath.add(node);

      if (getNode(graph, node).kind === endKind) {
        paths.push([...stack]);
      } else {
        // parallel edges would yield the same path twice
        for (const next of new Set(successors(graph, node))) {
          if (!onPath.has(next)) visit(next);
          if (limitHit) break;
        }
      }

      onPath.delete(node);
      stack.pop();
    };

    visit(startId);

    if (limitHit) {
      const pathsFound = paths.length - found;
      warnings.push({
        kind: "path-limit-exceeded",
        startId,
        maxPathLength,
        pathsFound,
        message: `Path search from "${startId}" stopped at ${maxPathLength} nodes after ${pathsFound} path(s)`,
      });
    }
  }

  return { paths, warnings };
}

/** True if any node of `kind` can be reached from `fromIds` along edges. */
export function reachesKind(
  graph: ProcessGraph,
  fromIds: ReadonlyArray<string>,
  kind: NodeKind
): boolean {
  const seen = new Set<string>(fromIds);
  const queue = [...fromIds];
  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    if (getNode(graph, node).kind === kind) return true;
    for (const next of successors(graph, node)) {
      if (!seen.has(next)) {
        seen.add(next);
        queue.push(next);
      }
    }
  }
  return false;
}

/** True if every node in `path` appears once. */
export function isSimplePath(path: Path): boolean {
  return new Set(path).size === path.length;
}
