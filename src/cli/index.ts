/**
 * procflow CLI -- analyze stored process documents
 *
 * Usage:
 *   procflow analyze <processId> [--store dir] [--metric duration|cost] [--max-path-length n]
 *   procflow stats <processId> [--store dir]
 *   procflow csv <processId> [--store dir]
 *   procflow simulate <processId> [--store dir] [--max-path-length n]
 */

import { config, createLogger, type WeightMetric } from "@procflow/core";
import {
  analysisToDocument,
  analyzeProcess,
  branchPoints,
  deadEnds,
  exportCsv,
  processKpis,
  processStatistics,
  requiredRoles,
  serializeDocument,
  type AnalysisOptions,
  type GraphDataProvider,
} from "@procflow/graph";
import { DirectoryGraphProvider } from "./directory-provider.js";

const log = createLogger("cli");

const COMMANDS = ["analyze", "stats", "csv", "simulate"] as const;

type Command = (typeof COMMANDS)[number];

interface CliOptions {
  command: Command;
  processId: string;
  store: string;
  metric?: WeightMetric;
  maxPathLength?: number;
}

/** Where the CLI writes. Each call receives complete text, newlines included. */
export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

/** Bad arguments; reported with the usage hint. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const USAGE = "Usage: procflow <analyze|stats|csv|simulate> <processId> [--store dir] [options]";

export const HELP = `
procflow - Analyze business process graphs

USAGE:
  procflow <command> <processId> [options]

COMMANDS:
  analyze   Print the process with layout, paths, bottlenecks and critical path as JSON
  stats     Print statistics, KPIs, roles, branch points and dead ends as JSON
  csv       Print the node table and the edge table as CSV
  simulate  Print a step-by-step walk of every start-to-end path as JSON

OPTIONS:
  --store <dir>              Directory holding <processId>.json documents (default: .)
  --metric <duration|cost>   Critical path weight (analyze)
  --max-path-length <n>      Longest path, in nodes, to search (analyze, simulate)
  -h, --help                 Show this help message

EXAMPLES:
  procflow analyze onboarding --store ./processes
  procflow analyze onboarding --metric cost
  procflow csv onboarding > onboarding.csv
`;

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function requireValue(args: ReadonlyArray<string>, i: number, flag: string): string {
  const value = args[i];
  if (value === undefined || value.startsWith("-")) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

/** Parse arguments; `undefined` means help was requested. */
export function parseArgs(args: ReadonlyArray<string>): CliOptions | undefined {
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) return undefined;

  const command = args[0];
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command}`);
  }

  let processId: string | undefined;
  let store = ".";
  let metric: WeightMetric | undefined;
  let maxPathLength: number | undefined;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--store") {
      store = requireValue(args, ++i, arg);
    } else if (arg === "--metric") {
      const value = requireValue(args, ++i, arg);
      if (value !== "duration" && value !== "cost") {
        throw new UsageError(`--metric must be duration or cost, got "${value}"`);
      }
      metric = value;
    } else if (arg === "--max-path-length") {
      const value = requireValue(args, ++i, arg);
      const n = Number(value);
      if (!/^\d+$/.test(value) || n < 1) {
        throw new UsageError(`--max-path-length must be a positive integer, got "${value}"`);
      }
      maxPathLength = n;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (processId === undefined) {
      processId = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  if (processId === undefined) {
    throw new UsageError(`${command} requires a process id`);
  }

  return {
    command,
    processId,
    store,
    ...(metric !== undefined ? { metric } : {}),
    ...(maxPathLength !== undefined ? { maxPathLength } : {}),
  };
}

function analysisOptionsFor(options: CliOptions): AnalysisOptions {
  return {
    ...(options.metric !== undefined ? { metric: options.metric } : {}),
    ...(options.maxPathLength !== undefined ? { maxPathLength: options.maxPathLength } : {}),
  };
}

async function analyze(provider: GraphDataProvider, options: CliOptions): Promise<string> {
  const { graph, analysis } = await analyzeProcess(provider, options.processId, analysisOptionsFor(options));
  return serializeDocument(analysisToDocument(graph, analysis)) + "\n";
}

async function simulate(provider: GraphDataProvider, options: CliOptions): Promise<string> {
  const { analysis } = await analyzeProcess(provider, options.processId, analysisOptionsFor(options));
  return JSON.stringify({ process: analysis.process, paths: analysis.simulation }, null, 2) + "\n";
}

async function stats(provider: GraphDataProvider, options: CliOptions): Promise<string> {
  const graph = await provider.fetchGraph(options.processId);
  const report = {
    process: graph.process,
    statistics: processStatistics(graph),
    kpis: processKpis(graph),
    roles: requiredRoles(graph),
    branchPoints: branchPoints(graph),
    deadEnds: deadEnds(graph),
  };
  return JSON.stringify(report, null, 2) + "\n";
}

async function csv(provider: GraphDataProvider, options: CliOptions): Promise<string> {
  const tables = exportCsv(await provider.fetchGraph(options.processId));
  return `${tables.nodes}\r\n${tables.edges}`;
}

/**
 * Run one CLI invocation and resolve to its exit code. Never rejects:
 * failures are written to `io.err` with a `procflow:` prefix.
 */
export async function runCli(
  args: ReadonlyArray<string>,
  io: CliIO,
  createProvider: (store: string) => GraphDataProvider = (store) => new DirectoryGraphProvider(store)
): Promise<number> {
  try {
    const options = parseArgs(args);
    if (options === undefined) {
      io.out(HELP);
      return 0;
    }

    const configFile = config.getConfigFilePath();
    if (configFile !== undefined) log.info(`Using config: ${configFile}`);

    const provider = createProvider(options.store);
    switch (options.command) {
      case "analyze":
        io.out(await analyze(provider, options));
        break;
      case "stats":
        io.out(await stats(provider, options));
        break;
      case "csv":
        io.out(await csv(provider, options));
        break;
      case "simulate":
        io.out(await simulate(provider, options));
        break;
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.err(`procflow: ${message}\n`);
    if (error instanceof UsageError) io.err(`${USAGE}\n`);
    return 1;
  }
}
