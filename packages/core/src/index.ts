export type { LogLevel, WeightMetric, ProcflowConfig, ProcflowConfigInput } from "./config.js";
export { config, ConfigError, DEFAULT_CONFIG, LOG_LEVELS, loadConfigFromEnv, toEnvVariable } from "./config.js";

export type { Logger } from "./logger.js";
export { createLogger, isLevelEnabled, isLogLevel } from "./logger.js";
