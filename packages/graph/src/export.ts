/**
 * Export Adapter
 *
 * Serializes a graph and any subset of analysis results into a
 * self-describing document, and rebuilds a graph from such a document.
 * Layout is stored for consumers but never read back: it is recomputed.
 */

import { z } from "zod";
import type {
  BottleneckRecord,
  CriticalPathResult,
  LayoutResult,
  NodeKind,
  Path,
  ProcessGraph,
  ProcessInfo,
} from "./types.js";
import { buildGraph, type ProcessNodeInput } from "./graph.js";
import { ValidationError, type ValidationIssue } from "./errors.js";

// ============================================================================
// Document schema
// ============================================================================

const nonNegative = z.number().finite().nonnegative();

const nodeKindSchema = z.enum(["Start", "End", "Task", "Gateway", "Event"]) satisfies z.ZodType<NodeKind>;

const documentNodeSchema = z.object({
  id: z.string().min(1),
  label: z.string(),
  kind: nodeKindSchema,
  duration: nonNegative.optional(),
  cost: nonNegative.optional(),
  role: z.string().optional(),
});

const documentEdgeSchema = z.object({
  from: z.string(),
  to: z.string(),
  label: z.string().optional(),
});

export const exportDocumentSchema = z.object({
  process: z.object({ id: z.string(), name: z.string() }),
  nodes: z.array(documentNodeSchema),
  edges: z.array(documentEdgeSchema),
  layout: z
    .array(
      z.object({
        id: z.string(),
        x: z.number(),
        y: z.number(),
        layer: z.number().int().nonnegative(),
      })
    )
    .optional(),
  paths: z.array(z.array(z.string())).optional(),
  bottlenecks: z
    .array(z.object({ id: z.string(), distinctPredecessorCount: z.number().int() }))
    .optional(),
  criticalPath: z.object({ nodes: z.array(z.string()), weight: z.number() }).optional(),
});

export type ExportDocument = z.infer<typeof exportDocumentSchema>;
export type ExportedNode = z.infer<typeof documentNodeSchema>;
export type ExportedEdge = z.infer<typeof documentEdgeSchema>;

/** Analysis results to embed; each is optional. */
export interface ExportSections {
  /** Defaults to the graph's own process metadata. */
  readonly process?: ProcessInfo;
  readonly layout?: LayoutResult;
  readonly paths?: ReadonlyArray<Path>;
  readonly bottlenecks?: ReadonlyArray<BottleneckRecord>;
  readonly criticalPath?: Pick<CriticalPathResult, "nodes" | "weight">;
}

// ============================================================================
// Export
// ============================================================================

/**
 * Build an export document. Sections not supplied are omitted.
 *
 * @throws ValidationError when neither the graph nor `sections.process`
 *   carries process metadata.
 */
export function exportDocument(graph: ProcessGraph, sections: ExportSections = {}): ExportDocument {
  const process = sections.process ?? graph.process;
  if (process === undefined) {
    throw new ValidationError([
      { path: "process", message: "process metadata is required to export a graph" },
    ]);
  }

  const doc: ExportDocument = {
    process: { id: process.id, name: process.name },
    nodes: graph.nodes.map((n) => {
      const node: ExportedNode = { id: n.id, label: n.label, kind: n.kind };
      if (n.attributes.duration !== undefined) node.duration = n.attributes.duration;
      if (n.attributes.cost !== undefined) node.cost = n.attributes.cost;
      if (n.attributes.role !== undefined) node.role = n.attributes.role;
      return node;
    }),
    edges: graph.edges.map((e) =>
      e.label !== undefined ? { from: e.from, to: e.to, label: e.label } : { from: e.from, to: e.to }
    ),
  };

  if (sections.layout) {
    doc.layout = [...sections.layout.positions.values()].map(({ id, x, y, layer }) => ({
      id,
      x,
      y,
      layer,
    }));
  }
  if (sections.paths) {
    doc.paths = sections.paths.map((p) => [...p]);
  }
  if (sections.bottlenecks) {
    doc.bottlenecks = sections.bottlenecks.map(({ id, distinctPredecessorCount }) => ({
      id,
      distinctPredecessorCount,
    }));
  }
  if (sections.criticalPath) {
    doc.criticalPath = {
      nodes: [...sections.criticalPath.nodes],
      weight: sections.criticalPath.weight,
    };
  }
  return doc;
}

// ============================================================================
// Import
// ============================================================================

export interface ImportedProcess {
  readonly process: ProcessInfo;
  readonly graph: ProcessGraph;
  readonly document: ExportDocument;
}

/**
 * Validate an export document and rebuild its graph.
 *
 * @throws ValidationError for a malformed document or an invalid graph.
 */
export function importDocument(value: unknown): ImportedProcess {
  const parsed = exportDocumentSchema.safeParse(value);
  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues.map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
    }));
    throw new ValidationError(issues);
  }

  const document = parsed.data;
  const nodes: ProcessNodeInput[] = document.nodes.map((n) => ({
    id: n.id,
    label: n.label,
    kind: n.kind,
    attributes: {
      ...(n.duration !== undefined ? { duration: n.duration } : {}),
      ...(n.cost !== undefined ? { cost: n.cost } : {}),
      ...(n.role !== undefined ? { role: n.role } : {}),
    },
  }));
  const graph = buildGraph(nodes, document.edges, document.process);
  return { process: document.process, graph, document };
}

function formatPath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) return "(document)";
  return path
    .map((part, i) => (typeof part === "number" ? `[${part}]` : i === 0 ? part : `.${part}`))
    .join("");
}

// ============================================================================
// JSON text
// ============================================================================

/** Pretty-printed JSON text for a document. */
export function serializeDocument(doc: ExportDocument): string {
  return JSON.stringify(doc, null, 2);
}

/**
 * Parse JSON text and import it.
 *
 * @throws ValidationError when the text is not JSON or not a valid document.
 */
export function parseDocument(text: string): ImportedProcess {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError([{ path: "(document)", message: `not valid JSON: ${reason}` }]);
  }
  return importDocument(value);
}
