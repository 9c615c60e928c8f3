/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: PROCFLOW_* (for CI overrides)
 * 3. Config files: .procflowrc, procflow.config.js, package.json#procflow, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@procflow/core";
 *
 * config.get("layout.nodeSpacingX")     // → 170
 * config.set({ criticalPath: { metric: "cost" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { z } from "zod";

// ============================================================================
// Types
// ============================================================================

export const LOG_LEVELS = ["off", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type WeightMetric = "duration" | "cost";

const layoutSchema = z
  .object({
    nodeSpacingX: z.number().positive(),
    layerSpacingY: z.number().positive(),
    originX: z.number().finite(),
    originY: z.number().finite(),
  })
  .strict();

const configSchema = z
  .object({
    logLevel: z.enum(LOG_LEVELS),
    layout: layoutSchema,
    paths: z
      .object({
        maxPathLength: z.number().int().positive().optional(),
      })
      .strict(),
    criticalPath: z
      .object({
        metric: z.enum(["duration", "cost"]),
      })
      .strict(),
  })
  .strict();

/** Fully resolved configuration. */
export type ProcflowConfig = z.infer<typeof configSchema>;

/** Partial configuration accepted from files, the environment and `config.set()`. */
export type ProcflowConfigInput = {
  [K in keyof ProcflowConfig]?: ProcflowConfig[K] extends object
    ? Partial<ProcflowConfig[K]>
    : ProcflowConfig[K];
};

/** Raised when merged configuration values fail validation. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: ReadonlyArray<string>,
    readonly source: string | undefined
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_CONFIG: ProcflowConfig = {
  logLevel: "warn",
  layout: {
    nodeSpacingX: 170,
    layerSpacingY: 120,
    originX: 40,
    originY: 50,
  },
  paths: {},
  criticalPath: {
    metric: "duration",
  },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: ProcflowConfig = DEFAULT_CONFIG;
let overrides: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let envValues: Record<string, unknown> = {};

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "PROCFLOW_";

const CONFIG_SECTIONS: ReadonlyArray<string> = Object.keys(DEFAULT_CONFIG);

/**
 * Load configuration from environment variables.
 *
 * `__` separates nesting levels; each level is snake case turned into camelCase:
 *   PROCFLOW_LOG_LEVEL=debug                 → { logLevel: "debug" }
 *   PROCFLOW_LAYOUT__NODE_SPACING_X=200      → { layout: { nodeSpacingX: 200 } }
 *
 * Variables whose first level is not a configuration section are ignored.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .split("__")
      .map(toCamelCase)
      .join(".");
    if (!CONFIG_SECTIONS.includes(configPath.split(".")[0])) continue;

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

/** `["layout", "nodeSpacingX"]` → `PROCFLOW_LAYOUT__NODE_SPACING_X` */
export function toEnvVariable(path: ReadonlyArray<string | number>): string {
  return (
    ENV_PREFIX +
    path
      .map((part) => String(part).replace(/[A-Z]/g, (ch) => `_${ch}`).toUpperCase())
      .join("__")
  );
}

function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase());
}

function parseEnvValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "procflow";

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not read ${MODULE_NAME} configuration: ${reason}`, [reason], undefined);
  }

  if (result === null || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new ConfigError(
      `Configuration in ${result.filepath} must be an object`,
      ["expected an object at the top level"],
      result.filepath
    );
  }
  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

function describeIssue(issue: z.ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  const fromEnv =
    issue.code === "unrecognized_keys"
      ? issue.keys.map((key) => [...issue.path, key])
      : [issue.path];
  const variables = fromEnv
    .filter((path) => path.length > 0 && getNestedValue(envValues, path.join(".")) !== undefined)
    .map(toEnvVariable);
  const source = variables.length > 0 ? ` (from ${variables.join(", ")})` : "";
  return `${where}: ${issue.message}${source}`;
}

function validate(merged: Record<string, unknown>): ProcflowConfig {
  const parsed = configSchema.safeParse(merged);
  if (parsed.success) return parsed.data;

  const issues = parsed.error.issues.map(describeIssue);
  throw new ConfigError(
    `Invalid ${MODULE_NAME} configuration:\n  ${issues.join("\n  ")}`,
    issues,
    configFilePath
  );
}

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();
  envValues = envConfig;

  // Merge: defaults < fileConfig < envConfig < overrides
  configStore = validate(
    deepMerge(deepMerge(deepMerge({ ...DEFAULT_CONFIG }, fileConfig), envConfig), overrides)
  );
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dotted path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically. Overrides survive later reloads
 * until `reset()` is called.
 */
function set(values: ProcflowConfigInput): void {
  initializeConfig();
  const nextOverrides = deepMerge(overrides, values);
  configStore = validate(deepMerge({ ...configStore }, values));
  overrides = nextOverrides;
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<ProcflowConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = DEFAULT_CONFIG;
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
  envValues = {};
}

export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
};
