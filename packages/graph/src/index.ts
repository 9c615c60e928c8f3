export type {
  NodeKind,
  NodeAttributes,
  ProcessNode,
  ProcessEdge,
  ProcessInfo,
  ProcessGraph,
  GraphIndex,
  WeightMetric,
  Path,
  NodePosition,
  LayoutResult,
  PathEnumeration,
  BottleneckRecord,
  CriticalPathResult,
  DegenerateGraphWarning,
  PathLimitExceeded,
  NoPathWarning,
  DeadEndWarning,
  AnalysisWarning,
} from "./types.js";
export { NODE_KINDS } from "./types.js";

export type { ProcessGraphErrorCode, ValidationIssue } from "./errors.js";
export {
  ProcessGraphError,
  ValidationError,
  UnknownNodeError,
  NoPathError,
  PathLimitError,
  NotFoundError,
} from "./errors.js";

// Graph model
export type { ProcessNodeInput } from "./graph.js";
export {
  buildGraph,
  hasNode,
  getNode,
  successors,
  predecessors,
  nodesOfKind,
  deadEnds,
} from "./graph.js";

// Layout
export type { LayoutOptions } from "./layout.js";
export { DEFAULT_LAYOUT_OPTIONS, layoutRoots, assignLayers, computeLayout } from "./layout.js";

// Analyzers
export type { PathOptions } from "./paths.js";
export { enumeratePaths, defaultMaxPathLength, isSimplePath, reachesKind } from "./paths.js";
export { findBottlenecks } from "./bottlenecks.js";
export type { CriticalPathOptions } from "./critical-path.js";
export { findCriticalPath, selectCriticalPath, nodeWeight, pathWeight } from "./critical-path.js";

export type { ProcessStatistics, BranchPoint, ProcessKpis } from "./metrics.js";
export {
  processStatistics,
  branchPoints,
  processKpis,
  requiredRoles,
  findNodesByLabel,
  SYSTEM_ROLES,
  ROUTING_KINDS,
} from "./metrics.js";

export type { SimulationStep } from "./simulation.js";
export { simulatePaths } from "./simulation.js";

// Export adapter
export type {
  ExportDocument,
  ExportedNode,
  ExportedEdge,
  ExportSections,
  ImportedProcess,
} from "./export.js";
export {
  exportDocumentSchema,
  exportDocument,
  importDocument,
  serializeDocument,
  parseDocument,
} from "./export.js";
export type { CsvTables } from "./csv.js";
export { exportCsv, csvField } from "./csv.js";

// Providers and entry point
export type { GraphDataProvider } from "./provider.js";
export { InMemoryGraphProvider } from "./provider.js";
export type { AnalysisOptions, ProcessAnalysis } from "./analysis.js";
export {
  analyzeGraph,
  analyzeProcess,
  analysisToDocument,
  resolveAnalysisOptions,
} from "./analysis.js";
