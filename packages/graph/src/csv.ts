import type { ProcessGraph } from "./types.js";

export interface CsvTables {
  readonly nodes: string;
  readonly edges: string;
}

const NODE_HEADER = ["ID", "Name", "Type", "Duration", "Cost", "Role"];
const EDGE_HEADER = ["Source", "Target", "Label"];

/** Quote a field when it holds a comma, quote or line break (RFC 4180). */
export function csvField(value: string | number | undefined): string {
  if (value === undefined) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function csvRow(fields: ReadonlyArray<string | number | undefined>): string {
  return fields.map(csvField).join(",");
}

/**
 * Render the graph as two CSV tables, one row per node and one per edge.
 * Rows end with CRLF, including the last.
 */
export function exportCsv(graph: ProcessGraph): CsvTables {
  const nodeRows = [
    csvRow(NODE_HEADER),
    ...graph.nodes.map((n) =>
      csvRow([n.id, n.label, n.kind, n.attributes.duration, n.attributes.cost, n.attributes.role])
    ),
  ];
  const edgeRows = [csvRow(EDGE_HEADER), ...graph.edges.map((e) => csvRow([e.from, e.to, e.label]))];
  return {
    nodes: nodeRows.map((row) => `${row}\r\n`).join(""),
    edges: edgeRows.map((row) => `${row}\r\n`).join(""),
  };
}
