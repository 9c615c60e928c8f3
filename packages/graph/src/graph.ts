import type {
  GraphIndex,
  NodeAttributes,
  NodeKind,
  ProcessEdge,
  ProcessGraph,
  ProcessInfo,
  ProcessNode,
} from "./types.js";
import { NODE_KINDS } from "./types.js";
import { UnknownNodeError, ValidationError, type ValidationIssue } from "./errors.js";

/** Node as accepted by `buildGraph`; attributes may be omitted. */
export interface ProcessNodeInput {
  readonly id: string;
  readonly label: string;
  readonly kind: NodeKind;
  readonly attributes?: NodeAttributes;
}

/**
 * Validate nodes and edges and build an indexed, immutable graph.
 *
 * Every problem is collected before throwing, so one `ValidationError`
 * reports all unknown references, duplicate ids and bad attributes.
 *
 * @example
 * ```ts
 * const g = buildGraph(
 *   [
 *     { id: "s", label: "Start", kind: "Start" },
 *     { id: "e", label: "End", kind: "End" },
 *   ],
 *   [{ from: "s", to: "e" }]
 * );
 * successors(g, "s"); // ["e"]
 * ```
 */
export function buildGraph(
  nodeInputs: ReadonlyArray<ProcessNodeInput>,
  edgeInputs: ReadonlyArray<ProcessEdge>,
  process?: ProcessInfo
): ProcessGraph {
  const issues: ValidationIssue[] = [];
  const nodesById = new Map<string, ProcessNode>();
  const positions = new Map<string, number>();
  const nodes: ProcessNode[] = [];

  nodeInputs.forEach((input, i) => {
    const at = `nodes[${i}]`;
    if (input.id === "") {
      issues.push({ path: `${at}.id`, message: "node id must not be empty" });
    } else if (nodesById.has(input.id)) {
      issues.push({ path: `${at}.id`, message: `duplicate node id "${input.id}"` });
    }
    if (!NODE_KINDS.includes(input.kind)) {
      issues.push({ path: `${at}.kind`, message: `unknown node kind "${String(input.kind)}"` });
    }
    const attributes = input.attributes ?? {};
    checkAttribute(attributes.duration, `${at}.attributes.duration`, issues);
    checkAttribute(attributes.cost, `${at}.attributes.cost`, issues);

    if (input.id !== "" && !nodesById.has(input.id)) {
      const node: ProcessNode = {
        id: input.id,
        label: input.label,
        kind: input.kind,
        attributes: { ...attributes },
      };
      nodesById.set(node.id, node);
      positions.set(node.id, nodes.length);
      nodes.push(node);
    }
  });

  const outgoing = new Map<string, string[]>();
  const incoming = new Map<string, string[]>();
  for (const n of nodes) {
    outgoing.set(n.id, []);
    incoming.set(n.id, []);
  }

  const edges: ProcessEdge[] = [];
  edgeInputs.forEach((input, i) => {
    const fromTargets = outgoing.get(input.from);
    const toSources = incoming.get(input.to);
    if (fromTargets === undefined) {
      issues.push({ path: `edges[${i}].from`, message: `unknown node id "${input.from}"` });
    }
    if (toSources === undefined) {
      issues.push({ path: `edges[${i}].to`, message: `unknown node id "${input.to}"` });
    }
    if (fromTargets === undefined || toSources === undefined) return;

    fromTargets.push(input.to);
    toSources.push(input.from);
    edges.push({
      from: input.from,
      to: input.to,
      ...(input.label !== undefined ? { label: input.label } : {}),
    });
  });

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  const index: GraphIndex = { nodesById, positions, outgoing, incoming };
  return {
    ...(process !== undefined ? { process: { id: process.id, name: process.name } } : {}),
    nodes,
    edges,
    index,
  };
}

function checkAttribute(value: number | undefined, path: string, issues: ValidationIssue[]): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value < 0) {
    issues.push({ path, message: `must be a finite, non-negative number (got ${value})` });
  }
}

/** True if the graph contains a node with this id. */
export function hasNode(graph: ProcessGraph, nodeId: string): boolean {
  return graph.index.nodesById.has(nodeId);
}

/** Look up a node. Throws `UnknownNodeError` if absent. */
export function getNode(graph: ProcessGraph, nodeId: string): ProcessNode {
  const node = graph.index.nodesById.get(nodeId);
  if (node === undefined) throw new UnknownNodeError(nodeId);
  return node;
}

/**
 * Targets of the edges leaving `nodeId`, in edge insertion order.
 * A target appears once per parallel edge.
 */
export function successors(graph: ProcessGraph, nodeId: string): ReadonlyArray<string> {
  const targets = graph.index.outgoing.get(nodeId);
  if (targets === undefined) throw new UnknownNodeError(nodeId);
  return targets;
}

/**
 * Sources of the edges entering `nodeId`, in edge insertion order.
 * A source appears once per parallel edge.
 */
export function predecessors(graph: ProcessGraph, nodeId: string): ReadonlyArray<string> {
  const sources = graph.index.incoming.get(nodeId);
  if (sources === undefined) throw new UnknownNodeError(nodeId);
  return sources;
}

/** Ids of all nodes of `kind`, in node insertion order. */
export function nodesOfKind(graph: ProcessGraph, kind: NodeKind): string[] {
  return graph.nodes.filter((n) => n.kind === kind).map((n) => n.id);
}

/** Non-End nodes without outgoing edges, in node insertion order. */
export function deadEnds(graph: ProcessGraph): string[] {
  return graph.nodes
    .filter((n) => n.kind !== "End" && successors(graph, n.id).length === 0)
    .map((n) => n.id);
}
