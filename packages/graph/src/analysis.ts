import { config, createLogger } from "@procflow/core";
import type {
  AnalysisWarning,
  BottleneckRecord,
  CriticalPathResult,
  LayoutResult,
  NodeKind,
  Path,
  ProcessGraph,
  ProcessInfo,
  WeightMetric,
} from "./types.js";
import { deadEnds } from "./graph.js";
import { computeLayout, type LayoutOptions } from "./layout.js";
import { enumeratePaths } from "./paths.js";
import { findBottlenecks } from "./bottlenecks.js";
import { selectCriticalPath } from "./critical-path.js";
import {
  branchPoints,
  processKpis,
  processStatistics,
  requiredRoles,
  type BranchPoint,
  type ProcessKpis,
  type ProcessStatistics,
} from "./metrics.js";
import { simulatePaths, type SimulationStep } from "./simulation.js";
import { exportDocument, type ExportDocument } from "./export.js";
import { NoPathError, PathLimitError } from "./errors.js";
import type { GraphDataProvider } from "./provider.js";

const log = createLogger("analysis");

export interface AnalysisOptions {
  readonly layout?: Partial<LayoutOptions>;
  readonly startKind?: NodeKind;
  readonly endKind?: NodeKind;
  readonly maxPathLength?: number;
  readonly metric?: WeightMetric;
}

/** Every analysis of one graph, as plain data for presentation. */
export interface ProcessAnalysis {
  readonly process?: ProcessInfo;
  readonly layout: LayoutResult;
  readonly paths: ReadonlyArray<Path>;
  readonly bottlenecks: ReadonlyArray<BottleneckRecord>;
  /** Absent when no start→end path exists (see the `no-path` warning). */
  readonly criticalPath?: CriticalPathResult;
  readonly deadEnds: ReadonlyArray<string>;
  readonly statistics: ProcessStatistics;
  readonly kpis: ProcessKpis;
  readonly roles: ReadonlyArray<string>;
  readonly branchPoints: ReadonlyArray<BranchPoint>;
  /** One step-by-step walk per path, in `paths` order. */
  readonly simulation: ReadonlyArray<ReadonlyArray<SimulationStep>>;
  readonly warnings: ReadonlyArray<AnalysisWarning>;
}

/** Fill unset options from configuration. */
export function resolveAnalysisOptions(options: AnalysisOptions = {}): AnalysisOptions {
  const settings = config.getAll();
  const maxPathLength = options.maxPathLength ?? settings.paths.maxPathLength;
  return {
    layout: { ...settings.layout, ...options.layout },
    startKind: options.startKind ?? "Start",
    endKind: options.endKind ?? "End",
    metric: options.metric ?? settings.criticalPath.metric,
    ...(maxPathLength !== undefined ? { maxPathLength } : {}),
  };
}

/**
 * Run layout, path, bottleneck, critical path, metric and simulation analyses
 * over a graph.
 *
 * Non-fatal conditions are collected in `warnings` and logged. A missing
 * start→end path, or one longer than `maxPathLength`, leaves `criticalPath`
 * unset; every other error propagates.
 */
export function analyzeGraph(graph: ProcessGraph, options: AnalysisOptions = {}): ProcessAnalysis {
  const resolved = resolveAnalysisOptions(options);
  const warnings: AnalysisWarning[] = [];
  const pathOptions = {
    startKind: resolved.startKind,
    endKind: resolved.endKind,
    maxPathLength: resolved.maxPathLength,
  };

  const layout = computeLayout(graph, resolved.layout);
  warnings.push(...layout.warnings);

  const enumeration = enumeratePaths(graph, pathOptions);
  warnings.push(...enumeration.warnings);

  let criticalPath: CriticalPathResult | undefined;
  try {
    criticalPath = selectCriticalPath(graph, enumeration, { ...pathOptions, metric: resolved.metric });
  } catch (error) {
    if (error instanceof NoPathError) {
      warnings.push({ kind: "no-path", message: error.message });
    } else if (!(error instanceof PathLimitError)) {
      throw error;
    }
    // PathLimitError is already reported by its path-limit-exceeded warning
  }

  const ends = deadEnds(graph);
  for (const nodeId of ends) {
    warnings.push({
      kind: "dead-end",
      nodeId,
      message: `Node "${nodeId}" has no outgoing flow and is not an End node`,
    });
  }

  for (const warning of warnings) log.warn(warning.message);
  log.debug(
    `Analyzed ${graph.nodes.length} nodes: ${enumeration.paths.length} path(s), ${warnings.length} warning(s)`
  );

  return {
    ...(graph.process !== undefined ? { process: graph.process } : {}),
    layout,
    paths: enumeration.paths,
    bottlenecks: findBottlenecks(graph),
    ...(criticalPath !== undefined ? { criticalPath } : {}),
    deadEnds: ends,
    statistics: processStatistics(graph),
    kpis: processKpis(graph),
    roles: requiredRoles(graph),
    branchPoints: branchPoints(graph),
    simulation: simulatePaths(graph, enumeration.paths),
    warnings,
  };
}

/**
 * Fetch a process through `provider` and analyze it.
 * Provider failures, `NotFoundError` included, reach the caller unchanged.
 */
export async function analyzeProcess(
  provider: GraphDataProvider,
  processId: string,
  options: AnalysisOptions = {}
): Promise<{ graph: ProcessGraph; analysis: ProcessAnalysis }> {
  const graph = await provider.fetchGraph(processId);
  return { graph, analysis: analyzeGraph(graph, options) };
}

/** Export document carrying the graph and every analysis section. */
export function analysisToDocument(graph: ProcessGraph, analysis: ProcessAnalysis): ExportDocument {
  return exportDocument(graph, {
    ...(analysis.process !== undefined ? { process: analysis.process } : {}),
    layout: analysis.layout,
    paths: analysis.paths,
    bottlenecks: analysis.bottlenecks,
    ...(analysis.criticalPath !== undefined ? { criticalPath: analysis.criticalPath } : {}),
  });
}
