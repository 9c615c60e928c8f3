import type {
  DegenerateGraphWarning,
  LayoutResult,
  NodePosition,
  ProcessGraph,
} from "./types.js";
import { nodesOfKind, predecessors, successors } from "./graph.js";
import { compareIds } from "./order.js";

/** Spacing in pixels between neighbouring nodes and between layers. */
export interface LayoutOptions {
  readonly nodeSpacingX: number;
  readonly layerSpacingY: number;
  readonly originX: number;
  readonly originY: number;
}

/** Wide enough that 120×60 node glyphs never touch. */
export const DEFAULT_LAYOUT_OPTIONS: LayoutOptions = {
  nodeSpacingX: 170,
  layerSpacingY: 120,
  originX: 40,
  originY: 50,
};

/**
 * Choose the layering roots: Start nodes, else source nodes, else the smallest id.
 */
export function layoutRoots(graph: ProcessGraph): {
  roots: string[];
  warning?: DegenerateGraphWarning;
} {
  const starts = nodesOfKind(graph, "Start");
  if (starts.length > 0) return { roots: starts };

  const sources = graph.nodes
    .filter((n) => predecessors(graph, n.id).length === 0)
    .map((n) => n.id);
  if (sources.length > 0 || graph.nodes.length === 0) return { roots: sources };

  const rootId = graph.nodes.map((n) => n.id).sort(compareIds)[0];
  return {
    roots: [rootId],
    warning: {
      kind: "degenerate-graph",
      rootId,
      message: `No start or source node; layering from "${rootId}"`,
    },
  };
}

/**
 * Layer every node by its breadth-first distance from the roots.
 *
 * All roots enter the queue at layer 0; the first visit fixes a node's layer,
 * so back edges never move a node. Nodes no root reaches land on layer 0.
 */
export function assignLayers(
  graph: ProcessGraph,
  roots: ReadonlyArray<string>
): { layers: Map<string, number>; isolated: string[] } {
  const layers = new Map<string, number>();
  const queue: string[] = [];
  for (const root of roots) {
    if (layers.has(root)) continue;
    layers.set(root, 0);
    queue.push(root);
  }

  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    const next = (layers.get(node) ?? 0) + 1;
    for (const neighbor of successors(graph, node)) {
      if (!layers.has(neighbor)) {
        layers.set(neighbor, next);
        queue.push(neighbor);
      }
    }
  }

  const isolated: string[] = [];
  for (const n of graph.nodes) {
    if (!layers.has(n.id)) {
      layers.set(n.id, 0);
      isolated.push(n.id);
    }
  }
  return { layers, isolated };
}

/**
 * Compute deterministic coordinates for every node.
 *
 * Within a layer, nodes are ordered by the smallest x-index among their
 * predecessors on lower layers (nodes with none go last), then by id.
 * The order index becomes x and the layer becomes y.
 */
export function computeLayout(
  graph: ProcessGraph,
  options: Partial<LayoutOptions> = {}
): LayoutResult {
  const { nodeSpacingX, layerSpacingY, originX, originY } = {
    ...DEFAULT_LAYOUT_OPTIONS,
    ...options,
  };
  const { roots, warning } = layoutRoots(graph);
  const { layers, isolated } = assignLayers(graph, roots);

  const byLayer: string[][] = [];
  for (const n of graph.nodes) {
    const layer = layers.get(n.id) ?? 0;
    if (byLayer[layer] === undefined) byLayer[layer] = [];
    byLayer[layer].push(n.id);
  }

  const xIndex = new Map<string, number>();
  const positions = new Map<string, NodePosition>();

  byLayer.forEach((members, layer) => {
    // xIndex holds only lower layers at this point
    const key = new Map<string, number>();
    for (const id of members) {
      let min = Infinity;
      for (const pred of predecessors(graph, id)) {
        const placed = xIndex.get(pred);
        if (placed !== undefined && placed < min) {
          min = placed;
        }
      }
      key.set(id, min);
    }

    const ordered = [...members].sort((a, b) => {
      const ka = key.get(a) ?? Infinity;
      const kb = key.get(b) ?? Infinity;
      if (ka !== kb) return ka < kb ? -1 : 1;
      return compareIds(a, b);
    });

    ordered.forEach((id, i) => {
      xIndex.set(id, i);
      positions.set(id, {
        id,
        x: originX + i * nodeSpacingX,
        y: originY + layer * layerSpacingY,
        layer,
      });
    });
  });

  return {
    positions,
    isolated,
    layerCount: byLayer.length,
    warnings: warning ? [warning] : [],
  };
}
