import { describe, it, expect } from "vitest";
import { analyzeGraph, buildGraph, enumeratePaths, simulatePaths, type ProcessGraph } from "../index.js";
import { linearGraph } from "./fixtures.js";

/** Start → Approved? → (yes) Approve / (no) Reject → End */
function approvalGraph(): ProcessGraph {
  return buildGraph(
    [
      { id: "start", label: "Request received", kind: "Start" },
      { id: "check", label: "Approved?", kind: "Gateway" },
      { id: "approve", label: "Grant access", kind: "Task" },
      { id: "reject", label: "Notify requester", kind: "Task" },
      { id: "end", label: "Done", kind: "End" },
    ],
    [
      { from: "start", to: "check" },
      { from: "check", to: "approve" },
      { from: "check", to: "approve", label: "yes" },
      { from: "check", to: "reject", label: "no" },
      { from: "approve", to: "end" },
      { from: "reject", to: "end", label: "closed" },
    ]
  );
}

describe("simulatePaths", () => {
  it("walks each path and attaches edge conditions", () => {
    const g = approvalGraph();
    expect(simulatePaths(g, enumeratePaths(g).paths)).toEqual([
      [
        { step: 1, id: "start", label: "Request received", kind: "Start" },
        { step: 2, id: "check", label: "Approved?", kind: "Gateway", condition: "yes" },
        { step: 3, id: "approve", label: "Grant access", kind: "Task" },
        { step: 4, id: "end", label: "Done", kind: "End" },
      ],
      [
        { step: 1, id: "start", label: "Request received", kind: "Start" },
        { step: 2, id: "check", label: "Approved?", kind: "Gateway", condition: "no" },
        { step: 3, id: "reject", label: "Notify requester", kind: "Task", condition: "closed" },
        { step: 4, id: "end", label: "Done", kind: "End" },
      ],
    ]);
  });

  it("has no conditions on unlabelled flows", () => {
    const steps = simulatePaths(linearGraph(), [["Start", "A", "B"]])[0];
    expect(steps.map((s) => s.condition)).toEqual([undefined, undefined, undefined]);
    expect(steps.map((s) => s.step)).toEqual([1, 2, 3]);
  });

  it("returns nothing for no paths", () => {
    expect(simulatePaths(approvalGraph(), [])).toEqual([]);
  });

  it("is part of the full analysis", () => {
    const analysis = analyzeGraph(approvalGraph());
    expect(analysis.simulation).toHaveLength(2);
    expect(analysis.simulation[1][1].condition).toBe("no");
  });
});
