import type { WeightMetric } from "@procflow/core";

/** The closed set of step kinds a process node can have. */
export type NodeKind = "Start" | "End" | "Task" | "Gateway" | "Event";

export const NODE_KINDS: ReadonlyArray<NodeKind> = ["Start", "End", "Task", "Gateway", "Event"];

/** Optional per-step attributes. `duration` is in minutes. */
export interface NodeAttributes {
  readonly duration?: number;
  readonly cost?: number;
  readonly role?: string;
}

/** One workflow step. */
export interface ProcessNode {
  readonly id: string;
  readonly label: string;
  readonly kind: NodeKind;
  readonly attributes: NodeAttributes;
}

/** A directed sequence flow. Parallel edges between the same pair are kept. */
export interface ProcessEdge {
  readonly from: string;
  readonly to: string;
  readonly label?: string;
}

/** Identity of the process a graph describes. */
export interface ProcessInfo {
  readonly id: string;
  readonly name: string;
}

/** Adjacency built once when the graph is constructed. */
export interface GraphIndex {
  readonly nodesById: ReadonlyMap<string, ProcessNode>;
  /** Position of each node in `nodes`. */
  readonly positions: ReadonlyMap<string, number>;
  readonly outgoing: ReadonlyMap<string, ReadonlyArray<string>>;
  readonly incoming: ReadonlyMap<string, ReadonlyArray<string>>;
}

/** An immutable, validated process graph. May contain cycles. */
export interface ProcessGraph {
  readonly process?: ProcessInfo;
  readonly nodes: ReadonlyArray<ProcessNode>;
  readonly edges: ReadonlyArray<ProcessEdge>;
  readonly index: GraphIndex;
}

/** Attribute summed along a path. Duration and cost are never combined. */
export type { WeightMetric };

/** A simple path: node ids from a start node to an end node, none repeated. */
export type Path = ReadonlyArray<string>;

/** Coordinates for one node. `layer` is the BFS distance class. */
export interface NodePosition {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly layer: number;
}

export interface LayoutResult {
  /** Keyed by node id; iteration order is layer, then x. */
  readonly positions: ReadonlyMap<string, NodePosition>;
  /** Nodes no root reaches; they sit on layer 0. */
  readonly isolated: ReadonlyArray<string>;
  readonly layerCount: number;
  readonly warnings: ReadonlyArray<DegenerateGraphWarning>;
}

export interface PathEnumeration {
  readonly paths: ReadonlyArray<Path>;
  readonly warnings: ReadonlyArray<PathLimitExceeded>;
}

export interface BottleneckRecord {
  readonly id: string;
  readonly distinctPredecessorCount: number;
}

export interface CriticalPathResult {
  readonly nodes: Path;
  readonly weight: number;
  readonly metric: WeightMetric;
  readonly warnings: ReadonlyArray<PathLimitExceeded>;
}

// ============================================================================
// Non-fatal signals
// ============================================================================

/** No start node and no source node: layout picked an arbitrary root. */
export interface DegenerateGraphWarning {
  readonly kind: "degenerate-graph";
  readonly rootId: string;
  readonly message: string;
}

/** Enumeration from `startId` stopped early because a path grew past the bound. */
export interface PathLimitExceeded {
  readonly kind: "path-limit-exceeded";
  readonly startId: string;
  readonly maxPathLength: number;
  readonly pathsFound: number;
  readonly message: string;
}

/** The critical path could not be computed because no start→end path exists. */
export interface NoPathWarning {
  readonly kind: "no-path";
  readonly message: string;
}

/** A non-End node without outgoing edges. */
export interface DeadEndWarning {
  readonly kind: "dead-end";
  readonly nodeId: string;
  readonly message: string;
}

export type AnalysisWarning =
  | DegenerateGraphWarning
  | PathLimitExceeded
  | NoPathWarning
  | DeadEndWarning;
