import type {
  CriticalPathResult,
  Path,
  PathEnumeration,
  ProcessGraph,
  ProcessNode,
  WeightMetric,
} from "./types.js";
import { getNode, nodesOfKind } from "./graph.js";
import { enumeratePaths, reachesKind, type PathOptions } from "./paths.js";
import { compareIdSequences } from "./order.js";
import { NoPathError, PathLimitError } from "./errors.js";

export interface CriticalPathOptions extends PathOptions {
  /** Attribute to accumulate. Default `duration`. */
  readonly metric?: WeightMetric;
}

/** A node's weight under `metric`; absent attributes weigh 0. */
export function nodeWeight(node: ProcessNode, metric: WeightMetric): number {
  switch (metric) {
    case "duration":
      return node.attributes.duration ?? 0;
    case "cost":
      return node.attributes.cost ?? 0;
    default: {
      const unreachable: never = metric;
      throw new Error(`Unknown weight metric: ${String(unreachable)}`);
    }
  }
}

/** Sum of `metric` over the nodes of `path`. */
export function pathWeight(graph: ProcessGraph, path: Path, metric: WeightMetric): number {
  let total = 0;
  for (const id of path) total += nodeWeight(getNode(graph, id), metric);
  return total;
}

/**
 * Find the start→end path with the greatest accumulated weight.
 *
 * Ties go to the path with fewer nodes, then to the lexicographically
 * smallest id sequence, so the answer does not depend on discovery order.
 * With no weights at all this is the fewest-hop path at weight 0.
 *
 * @throws NoPathError when no start→end path exists.
 * @throws PathLimitError when paths exist but all are longer than `maxPathLength`.
 */
export function findCriticalPath(
  graph: ProcessGraph,
  options: CriticalPathOptions = {}
): CriticalPathResult {
  return selectCriticalPath(graph, enumeratePaths(graph, options), options);
}

/**
 * Pick the critical path among already enumerated paths. `options` must name
 * the start and end kinds the enumeration used.
 *
 * @throws NoPathError when `enumeration` holds no path and no end node is
 *   reachable from a start node.
 * @throws PathLimitError when `enumeration` holds no path because the search
 *   was cut short.
 */
export function selectCriticalPath(
  graph: ProcessGraph,
  enumeration: PathEnumeration,
  options: CriticalPathOptions = {}
): CriticalPathResult {
  const metric = options.metric ?? "duration";
  const { paths, warnings } = enumeration;

  let best: { nodes: Path; weight: number } | undefined;
  for (const nodes of paths) {
    const weight = pathWeight(graph, nodes, metric);
    if (best === undefined || isHeavier({ nodes, weight }, best)) {
      best = { nodes, weight };
    }
  }

  if (best === undefined) {
    const endKind = options.endKind ?? "End";
    const startIds = nodesOfKind(graph, options.startKind ?? "Start");
    const endIds = nodesOfKind(graph, endKind);
    const limit = warnings[0];
    if (limit !== undefined && reachesKind(graph, startIds, endKind)) {
      throw new PathLimitError(limit.maxPathLength, startIds, endIds);
    }
    throw new NoPathError(startIds, endIds);
  }
  return { nodes: best.nodes, weight: best.weight, metric, warnings };
}

function isHeavier(
  candidate: { nodes: Path; weight: number },
  current: { nodes: Path; weight: number }
): boolean {
  if (candidate.weight !== current.weight) return candidate.weight > current.weight;
  if (candidate.nodes.length !== current.nodes.length) {
    return candidate.nodes.length < current.nodes.length;
  }
  return compareIdSequences(candidate.nodes, current.nodes) < 0;
}
