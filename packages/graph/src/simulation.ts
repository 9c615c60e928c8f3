import type { NodeKind, Path, ProcessGraph } from "./types.js";
import { getNode } from "./graph.js";

/** One step of a walk along a path. */
export interface SimulationStep {
  /** 1-based position in the path. */
  readonly step: number;
  readonly id: string;
  readonly label: string;
  readonly kind: NodeKind;
  /** Label of the edge taken to the next step, when it has one. */
  readonly condition?: string;
}

/**
 * Walk each path step by step. A step records the condition on the edge
 * leading to the following node; among parallel edges the first labelled
 * one is used.
 */
export function simulatePaths(
  graph: ProcessGraph,
  paths: ReadonlyArray<Path>
): SimulationStep[][] {
  return paths.map((path) =>
    path.map((id, i) => {
      const node = getNode(graph, id);
      const condition = i + 1 < path.length ? edgeCondition(graph, id, path[i + 1]) : undefined;
      return {
        step: i + 1,
        id,
        label: node.label,
        kind: node.kind,
        ...(condition !== undefined ? { condition } : {}),
      };
    })
  );
}

function edgeCondition(graph: ProcessGraph, from: string, to: string): string | undefined {
  return graph.edges.find((e) => e.from === from && e.to === to && e.label !== undefined)?.label;
}
