import { buildGraph, type ProcessNodeInput } from "../graph.js";
import type { NodeAttributes, NodeKind, ProcessEdge, ProcessGraph } from "../types.js";

export function node(id: string, kind: NodeKind = "Task", attributes?: NodeAttributes): ProcessNodeInput {
  return attributes ? { id, label: id, kind, attributes } : { id, label: id, kind };
}

/** Edges joining consecutive ids. */
export function chain(...ids: string[]): ProcessEdge[] {
  const edges: ProcessEdge[] = [];
  for (let i = 0; i + 1 < ids.length; i++) edges.push({ from: ids[i], to: ids[i + 1] });
  return edges;
}

/** Start → A → B → C → End */
export function linearGraph(): ProcessGraph {
  return buildGraph(
    [node("Start", "Start"), node("A"), node("B"), node("C"), node("End", "End")],
    chain("Start", "A", "B", "C", "End"),
    { id: "linear", name: "Linear process" }
  );
}

/** Start → A, Start → B, A → C, B → C, C → End */
export function diamondGraph(weights: Partial<Record<string, NodeAttributes>> = {}): ProcessGraph {
  return buildGraph(
    ["Start", "A", "B", "C", "End"].map((id) =>
      node(id, id === "Start" ? "Start" : id === "End" ? "End" : "Task", weights[id])
    ),
    [
      { from: "Start", to: "A" },
      { from: "Start", to: "B" },
      { from: "A", to: "C" },
      { from: "B", to: "C" },
      { from: "C", to: "End" },
    ],
    { id: "diamond", name: "Diamond process" }
  );
}

/** Start → A → B → A (rework loop), A → End */
export function feedbackGraph(): ProcessGraph {
  return buildGraph(
    [node("Start", "Start"), node("A"), node("B"), node("End", "End")],
    [
      { from: "Start", to: "A" },
      { from: "A", to: "B" },
      { from: "B", to: "A" },
      { from: "A", to: "End" },
    ]
  );
}

/** Start → A → B → A with no way out; End is unreachable. */
export function trappedLoopGraph(): ProcessGraph {
  return buildGraph(
    [node("Start", "Start"), node("A"), node("B"), node("End", "End")],
    [
      { from: "Start", to: "A" },
      { from: "A", to: "B" },
      { from: "B", to: "A" },
    ]
  );
}
