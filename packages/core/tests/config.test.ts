import { mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { config, ConfigError, DEFAULT_CONFIG, loadConfigFromEnv, toEnvVariable } from "@procflow/core";

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  config.reset();
});

describe("loadConfigFromEnv", () => {
  it("maps prefixed variables onto nested camelCase paths", () => {
    const env = {
      PROCFLOW_LOG_LEVEL: "debug",
      PROCFLOW_LAYOUT__NODE_SPACING_X: "200",
      PROCFLOW_CRITICAL_PATH__METRIC: "cost",
      HOME: "/home/test",
    };
    expect(loadConfigFromEnv(env)).toEqual({
      logLevel: "debug",
      layout: { nodeSpacingX: 200 },
      criticalPath: { metric: "cost" },
    });
  });

  it("parses booleans and decimals", () => {
    expect(
      loadConfigFromEnv({ PROCFLOW_LAYOUT__A: "true", PROCFLOW_LAYOUT__B: "false", PROCFLOW_LAYOUT__C: "-1.5" })
    ).toEqual({ layout: { a: true, b: false, c: -1.5 } });
  });

  it("ignores unrelated variables", () => {
    expect(loadConfigFromEnv({ PATH: "/usr/bin" })).toEqual({});
  });

  it("ignores prefixed variables outside the configuration sections", () => {
    expect(loadConfigFromEnv({ PROCFLOW_HOME: "/opt/procflow", PROCFLOW_LOG_LEVEL: "info" })).toEqual({
      logLevel: "info",
    });
  });
});

describe("toEnvVariable", () => {
  it("maps a config path back to its variable", () => {
    expect(toEnvVariable(["layout", "nodeSpacingX"])).toBe("PROCFLOW_LAYOUT__NODE_SPACING_X");
    expect(toEnvVariable(["logLevel"])).toBe("PROCFLOW_LOG_LEVEL");
  });
});

describe("config", () => {
  it("starts from the defaults", () => {
    expect(config.getAll()).toEqual(DEFAULT_CONFIG);
    expect(config.get("layout.nodeSpacingX")).toBe(170);
    expect(config.get("criticalPath.metric")).toBe("duration");
  });

  it("returns undefined for unknown paths", () => {
    expect(config.get("layout.missing")).toBeUndefined();
    expect(config.get("logLevel.deeper")).toBeUndefined();
  });

  it("merges programmatic values over the defaults", () => {
    config.set({ layout: { layerSpacingY: 300 } });
    expect(config.getAll().layout).toEqual({
      nodeSpacingX: 170,
      layerSpacingY: 300,
      originX: 40,
      originY: 50,
    });
  });

  it("reads environment overrides", () => {
    vi.stubEnv("PROCFLOW_PATHS__MAX_PATH_LENGTH", "12");
    vi.stubEnv("PROCFLOW_LOG_LEVEL", "info");
    expect(config.get("paths.maxPathLength")).toBe(12);
    expect(config.get("logLevel")).toBe("info");
  });

  it("lets programmatic values win over the environment", () => {
    vi.stubEnv("PROCFLOW_CRITICAL_PATH__METRIC", "cost");
    config.set({ criticalPath: { metric: "duration" } });
    expect(config.get("criticalPath.metric")).toBe("duration");
  });

  it("rejects invalid programmatic values and keeps the previous state", () => {
    expect(() => config.set({ layout: { nodeSpacingX: -5 } })).toThrow(ConfigError);
    expect(config.get("layout.nodeSpacingX")).toBe(170);
  });

  it("reports every invalid environment value", () => {
    vi.stubEnv("PROCFLOW_LOG_LEVEL", "loud");
    vi.stubEnv("PROCFLOW_LAYOUT__ORIGIN_X", "left");
    let caught: unknown;
    try {
      config.getAll();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues.some((issue) => issue.startsWith("logLevel:"))).toBe(true);
      expect(caught.issues.some((issue) => issue.startsWith("layout.originX:"))).toBe(true);
    }
  });

  it("rejects unknown keys and names the variable", () => {
    vi.stubEnv("PROCFLOW_LAYOUT__ZOOM", "2");
    expect(() => config.getAll()).toThrow(ConfigError);
    expect(() => config.getAll()).toThrow("(from PROCFLOW_LAYOUT__ZOOM)");
  });

  it("names the variable behind an invalid value", () => {
    vi.stubEnv("PROCFLOW_CRITICAL_PATH__METRIC", "speed");
    let caught: unknown;
    try {
      config.getAll();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(1);
      expect(caught.issues[0].startsWith("criticalPath.metric: ")).toBe(true);
      expect(caught.issues[0].endsWith(" (from PROCFLOW_CRITICAL_PATH__METRIC)")).toBe(true);
    }
  });

  it("does not fail on unrelated prefixed variables", () => {
    vi.stubEnv("PROCFLOW_HOME", "/opt/procflow");
    expect(config.getAll()).toEqual(DEFAULT_CONFIG);
  });

  it("reset drops programmatic overrides", () => {
    config.set({ logLevel: "debug" });
    config.reset();
    expect(config.get("logLevel")).toBe("warn");
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "procflow-config-"));
    vi.spyOn(process, "cwd").mockReturnValue(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reports no file when none is found", () => {
    expect(config.getConfigFilePath()).toBeUndefined();
    expect(config.getAll()).toEqual(DEFAULT_CONFIG);
  });

  it("loads .procflowrc.json and reports its path", async () => {
    const file = path.join(dir, ".procflowrc.json");
    await writeFile(file, JSON.stringify({ layout: { nodeSpacingX: 200 } }), "utf-8");

    expect(config.getConfigFilePath()).toBe(file);
    expect(config.get("layout.nodeSpacingX")).toBe(200);
    expect(config.get("layout.originX")).toBe(40);
  });

  it("lets the environment override the file", async () => {
    await writeFile(path.join(dir, ".procflowrc.json"), JSON.stringify({ logLevel: "error" }), "utf-8");
    vi.stubEnv("PROCFLOW_LOG_LEVEL", "debug");
    expect(config.get("logLevel")).toBe("debug");
  });

  it("names the file in validation errors", async () => {
    const file = path.join(dir, ".procflowrc.json");
    await writeFile(file, JSON.stringify({ criticalPath: { metric: "speed" } }), "utf-8");

    let caught: unknown;
    try {
      config.getAll();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) expect(caught.source).toBe(file);
  });
});
