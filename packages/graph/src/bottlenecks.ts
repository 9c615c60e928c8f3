import type { BottleneckRecord, ProcessGraph } from "./types.js";
import { predecessors } from "./graph.js";
import { compareIds } from "./order.js";

/**
 * Rank convergence points: nodes entered from more than one distinct
 * predecessor. Parallel edges from the same node count once.
 * Sorted by count descending, then id ascending.
 */
export function findBottlenecks(graph: ProcessGraph): BottleneckRecord[] {
  const records: BottleneckRecord[] = [];
  for (const n of graph.nodes) {
    const distinctPredecessorCount = new Set(predecessors(graph, n.id)).size;
    if (distinctPredecessorCount > 1) {
      records.push({ id: n.id, distinctPredecessorCount });
    }
  }
  return records.sort(
    (a, b) => b.distinctPredecessorCount - a.distinctPredecessorCount || compareIds(a.id, b.id)
  );
}
