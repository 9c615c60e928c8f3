/**
 * @procflow/graph Showcase
 *
 * Self-documenting walk through graph construction, layout, path and
 * bottleneck analysis, critical paths, metrics and export.
 *
 * Type-checked with the rest of the repo (`npm run typecheck`).
 */

import assert from "node:assert/strict";

import {
  // Graph construction
  buildGraph,
  successors,
  predecessors,
  deadEnds,

  // Analyses
  computeLayout,
  enumeratePaths,
  findBottlenecks,
  findCriticalPath,
  processKpis,
  requiredRoles,
  branchPoints,

  // Export and entry point
  exportDocument,
  importDocument,
  exportCsv,
  analyzeGraph,
  analyzeProcess,
  InMemoryGraphProvider,

  // Errors
  ValidationError,
  NoPathError,
} from "../src/index.js";

// ============================================================================
// 1. GRAPH CONSTRUCTION - nodes, edges and validation
// ============================================================================

const invoice = buildGraph(
  [
    { id: "receive", label: "Receive invoice", kind: "Start" },
    { id: "match", label: "Match to order", kind: "Task", attributes: { duration: 10, role: "Clerk" } },
    { id: "ok", label: "Amounts agree?", kind: "Gateway" },
    { id: "query", label: "Query supplier", kind: "Task", attributes: { duration: 60, cost: 15, role: "Buyer" } },
    { id: "approve", label: "Approve payment", kind: "Task", attributes: { duration: 5, cost: 2, role: "Manager" } },
    { id: "paid", label: "Paid", kind: "End" },
  ],
  [
    { from: "receive", to: "match" },
    { from: "match", to: "ok" },
    { from: "ok", to: "approve", label: "yes" },
    { from: "ok", to: "query", label: "no" },
    { from: "query", to: "match" },
    { from: "approve", to: "paid" },
  ],
  { id: "invoice", name: "Invoice approval" }
);

assert.deepEqual(successors(invoice, "ok"), ["approve", "query"]);
assert.deepEqual(predecessors(invoice, "match"), ["receive", "query"]);
assert.deepEqual(deadEnds(invoice), []);

// Every problem is reported at once
try {
  buildGraph([{ id: "a", label: "A", kind: "Task" }], [{ from: "a", to: "b" }]);
  assert.fail("expected a ValidationError");
} catch (error) {
  assert.ok(error instanceof ValidationError);
  assert.deepEqual(error.issues, [{ path: "edges[0].to", message: 'unknown node id "b"' }]);
}

// ============================================================================
// 2. LAYOUT - BFS layers, deterministic x order
// ============================================================================

const layout = computeLayout(invoice);
assert.equal(layout.positions.get("receive")?.layer, 0);
assert.equal(layout.positions.get("ok")?.layer, 2);
// the rework edge query → match does not pull match down
assert.equal(layout.positions.get("match")?.layer, 1);
assert.deepEqual(layout.positions.get("approve"), { id: "approve", x: 40, y: 410, layer: 3 });
assert.deepEqual(layout.positions.get("query"), { id: "query", x: 210, y: 410, layer: 3 });

// ============================================================================
// 3. PATHS, BOTTLENECKS AND THE CRITICAL PATH
// ============================================================================

assert.deepEqual(enumeratePaths(invoice).paths, [["receive", "match", "ok", "approve", "paid"]]);
assert.deepEqual(findBottlenecks(invoice), [{ id: "match", distinctPredecessorCount: 2 }]);

const critical = findCriticalPath(invoice, { metric: "duration" });
assert.equal(critical.weight, 15);

const stuck = buildGraph(
  [
    { id: "s", label: "Start", kind: "Start" },
    { id: "e", label: "End", kind: "End" },
  ],
  []
);
assert.throws(() => findCriticalPath(stuck), NoPathError);

// ============================================================================
// 4. METRICS
// ============================================================================

assert.deepEqual(processKpis(invoice), { totalMinutes: 75, totalHours: 1.25, totalCost: 17 });
assert.deepEqual(requiredRoles(invoice), ["Clerk", "Buyer", "Manager"]);
assert.deepEqual(
  branchPoints(invoice).map((b) => [b.id, b.branchCount]),
  [["ok", 2]]
);

// ============================================================================
// 5. EXPORT - documents, CSV and the provider-backed entry point
// ============================================================================

const doc = exportDocument(invoice, { layout, criticalPath: critical });
assert.deepEqual(importDocument(doc).graph.nodes, invoice.nodes);
assert.ok(exportCsv(invoice).edges.startsWith("Source,Target,Label\r\n"));

const analysis = analyzeGraph(invoice);
assert.deepEqual(analysis.warnings, []);

const provider = new InMemoryGraphProvider([doc]);
const fetched = await analyzeProcess(provider, "invoice");
assert.deepEqual(fetched.analysis.criticalPath?.nodes, critical.nodes);
