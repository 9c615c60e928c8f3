import type { NodeKind, ProcessGraph } from "./types.js";
import { successors } from "./graph.js";
import { compareIds } from "./order.js";

export interface ProcessStatistics {
  readonly totalNodes: number;
  readonly totalEdges: number;
  readonly byKind: Readonly<Record<NodeKind, number>>;
}

/** Node and edge counts, with a count for every kind. */
export function processStatistics(graph: ProcessGraph): ProcessStatistics {
  const byKind: Record<NodeKind, number> = { Start: 0, End: 0, Task: 0, Gateway: 0, Event: 0 };
  for (const n of graph.nodes) byKind[n.kind]++;
  return { totalNodes: graph.nodes.length, totalEdges: graph.edges.length, byKind };
}

export interface BranchPoint {
  readonly id: string;
  readonly kind: NodeKind;
  readonly branchCount: number;
  /** Distinct targets in edge insertion order. */
  readonly targets: ReadonlyArray<string>;
}

/** Kinds that route the flow. */
export const ROUTING_KINDS: ReadonlyArray<NodeKind> = ["Gateway", "Event"];

/**
 * Routing nodes (`kinds`, default Gateway and Event) with at least one
 * distinct successor, sorted by id.
 */
export function branchPoints(
  graph: ProcessGraph,
  kinds: ReadonlyArray<NodeKind> = ROUTING_KINDS
): BranchPoint[] {
  const result: BranchPoint[] = [];
  for (const n of graph.nodes) {
    if (!kinds.includes(n.kind)) continue;
    const targets = [...new Set(successors(graph, n.id))];
    if (targets.length > 0) {
      result.push({ id: n.id, kind: n.kind, branchCount: targets.length, targets });
    }
  }
  return result.sort((a, b) => compareIds(a.id, b.id));
}

export interface ProcessKpis {
  readonly totalMinutes: number;
  /** `totalMinutes / 60`, rounded to two decimals. */
  readonly totalHours: number;
  readonly totalCost: number;
}

/** Summed duration and cost over every node; absent values count as 0. */
export function processKpis(graph: ProcessGraph): ProcessKpis {
  let totalMinutes = 0;
  let totalCost = 0;
  for (const n of graph.nodes) {
    totalMinutes += n.attributes.duration ?? 0;
    totalCost += n.attributes.cost ?? 0;
  }
  return {
    totalMinutes,
    totalHours: Math.round((totalMinutes / 60) * 100) / 100,
    totalCost,
  };
}

/** Roles that stand for the engine itself rather than people. */
export const SYSTEM_ROLES: ReadonlyArray<string> = ["System", "Start", "End"];

/** Distinct staff roles the process needs, in first-seen order. */
export function requiredRoles(graph: ProcessGraph): string[] {
  const roles = new Set<string>();
  for (const n of graph.nodes) {
    const role = n.attributes.role?.trim();
    if (role && !SYSTEM_ROLES.includes(role)) roles.add(role);
  }
  return [...roles];
}

/** Ids of nodes of `kinds` (default Task) whose label contains `text`, ignoring case. */
export function findNodesByLabel(
  graph: ProcessGraph,
  text: string,
  kinds: ReadonlyArray<NodeKind> = ["Task"]
): string[] {
  const needle = text.toLowerCase();
  return graph.nodes
    .filter((n) => kinds.includes(n.kind) && n.label.toLowerCase().includes(needle))
    .map((n) => n.id);
}
