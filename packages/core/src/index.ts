/**
 * @jobgraph/core - Shared primitives for jobgraph packages
 *
 * Provides logging, run correlation, configuration and base errors
 * for the dependency graph engine and its command line front end.
 */

// Logging (Pino-based logger)
export {
  getLogger,
  createLogger,
  resetLogger,
  resolveConfig as resolveLoggerConfig,
  getContext,
  getContextLogger,
  runAnalysis,
  runStep,
  runWithContext
} from "./logger/index.js";
export type {
  Logger,
  LoggerConfig,
  RunContext,
  RotationConfig,
  LogLevel
} from "./logger/index.js";
export { LogLevels } from "./logger/index.js";

// Errors
export { JobGraphError, ConfigurationError } from "./errors/index.js";

// Configuration
export { loadConfig, loadBaseConfig, BaseConfigSchema } from "./config/index.js";
export type { BaseConfig, EnvMapping, EnvSource } from "./config/index.js";
