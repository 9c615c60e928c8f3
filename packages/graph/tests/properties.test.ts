/**
 * Property-based checks over small random process graphs.
 */

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import {
  buildGraph,
  computeLayout,
  enumeratePaths,
  exportDocument,
  findBottlenecks,
  findCriticalPath,
  getNode,
  importDocument,
  isSimplePath,
  NODE_KINDS,
  pathWeight,
  successors,
  type ProcessGraph,
} from "../src/index.js";

const graphArb: fc.Arbitrary<ProcessGraph> = fc.integer({ min: 1, max: 7 }).chain((n) =>
  fc
    .record({
      kinds: fc.array(fc.constantFrom(...NODE_KINDS), { minLength: n, maxLength: n }),
      durations: fc.array(fc.option(fc.integer({ min: 0, max: 50 }), { nil: undefined }), {
        minLength: n,
        maxLength: n,
      }),
      edges: fc.array(fc.tuple(fc.nat(n - 1), fc.nat(n - 1)), { maxLength: 2 * n }),
    })
    .map(({ kinds, durations, edges }) =>
      buildGraph(
        kinds.map((kind, i) => {
          const duration = durations[i];
          return {
            id: `n${i}`,
            label: `Step ${i}`,
            kind,
            attributes: duration !== undefined ? { duration } : {},
          };
        }),
        edges.map(([from, to]) => ({ from: `n${from}`, to: `n${to}` })),
        { id: "generated", name: "Generated process" }
      )
    )
);

describe("layout properties", () => {
  it("is deterministic", () => {
    fc.assert(
      fc.property(graphArb, (g) => {
        const first = [...computeLayout(g).positions.entries()];
        const second = [...computeLayout(g).positions.entries()];
        expect(second).toEqual(first);
      })
    );
  });

  it("never places a reached node's successor more than one layer below it", () => {
    fc.assert(
      fc.property(graphArb, (g) => {
        const layout = computeLayout(g);
        const isolated = new Set(layout.isolated);
        for (const e of g.edges) {
          if (isolated.has(e.from)) continue;
          const from = layout.positions.get(e.from)?.layer ?? -1;
          const to = layout.positions.get(e.to)?.layer ?? -1;
          expect(to).toBeLessThanOrEqual(from + 1);
        }
      })
    );
  });

  it("gives every node in a layer its own x", () => {
    fc.assert(
      fc.property(graphArb, (g) => {
        const layout = computeLayout(g);
        expect(layout.positions.size).toBe(g.nodes.length);
        const seen = new Set<string>();
        for (const p of layout.positions.values()) {
          const cell = `${p.layer}:${p.x}`;
          expect(seen.has(cell)).toBe(false);
          seen.add(cell);
        }
      })
    );
  });
});

describe("path properties", () => {
  it("yields simple start-to-end paths along existing edges", () => {
    fc.assert(
      fc.property(graphArb, (g) => {
        const { paths, warnings } = enumeratePaths(g);
        expect(warnings).toEqual([]);
        for (const path of paths) {
          expect(isSimplePath(path)).toBe(true);
          expect(getNode(g, path[0]).kind).toBe("Start");
          expect(getNode(g, path[path.length - 1]).kind).toBe("End");
          for (let i = 0; i + 1 < path.length; i++) {
            expect(successors(g, path[i])).toContain(path[i + 1]);
          }
        }
      })
    );
  });

  it("picks a critical path at least as heavy as any other", () => {
    fc.assert(
      fc.property(graphArb, (g) => {
        const { paths } = enumeratePaths(g);
        fc.pre(paths.length > 0);
        const critical = findCriticalPath(g);
        for (const path of paths) {
          expect(pathWeight(g, path, "duration")).toBeLessThanOrEqual(critical.weight);
        }
      })
    );
  });
});

describe("bottleneck properties", () => {
  it("reports only joins, most predecessors first", () => {
    fc.assert(
      fc.property(graphArb, (g) => {
        const records = findBottlenecks(g);
        for (let i = 0; i < records.length; i++) {
          expect(records[i].distinctPredecessorCount).toBeGreaterThan(1);
          if (i > 0) {
            expect(records[i].distinctPredecessorCount).toBeLessThanOrEqual(
              records[i - 1].distinctPredecessorCount
            );
          }
        }
      })
    );
  });
});

describe("export properties", () => {
  it("rebuilds the same graph from its export document", () => {
    fc.assert(
      fc.property(graphArb, (g) => {
        const { graph } = importDocument(exportDocument(g));
        expect(graph.nodes).toEqual(g.nodes);
        expect(graph.edges).toEqual(g.edges);
      })
    );
  });
});
