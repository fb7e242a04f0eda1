/**
 * File: packages/core/src/logger/types.ts
 * Purpose: Type definitions for the jobgraph logging system
 * Relationships: Used by factory.ts, context.ts, and every package that logs
 * Key Dependencies: pino
 */

import type { Logger as PinoLogger, LoggerOptions, Bindings } from 'pino';

/**
 * Supported log levels (ordered by severity)
 */
export type LogLevel =
  | 'trace'   // Most verbose, graph traversal detail
  | 'debug'   // Per-pass diagnostics
  | 'info'    // General operational messages
  | 'warn'    // Warning conditions
  | 'error'   // Error conditions
  | 'fatal';  // Critical failures

/**
 * Numeric log levels (Pino internal)
 */
export const LogLevels = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60
} as const;

/**
 * File rotation settings
 */
export interface RotationConfig {
  /**
   * Enable log rotation
   * @default true (when toFile=true)
   */
  enabled?: boolean;

  /**
   * Rotation frequency
   * @default 'daily'
   */
  frequency?: 'daily' | 'hourly';

  /**
   * Maximum file size before rotation
   * Examples: '50m', '100m', '1g'
   * @default '50m'
   */
  maxSize?: string;

  /**
   * Number of rotated files to keep
   * @default 14
   */
  retention?: number;
}

/**
 * Configuration for logger creation
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default 'info' (production), 'debug' (development)
   */
  level?: LogLevel;

  /**
   * Enable file logging
   * @default false
   */
  toFile?: boolean;

  /**
   * Path to log file
   * @default './logs/jobgraph.log'
   */
  filePath?: string;

  /**
   * Enable pretty-printing for development
   * Auto-detected from NODE_ENV if not specified
   */
  pretty?: boolean;

  rotation?: RotationConfig;

  name?: string;

  /**
   * Enable logger (disabled under NODE_ENV=test)
   * @default true
   */
  enabled?: boolean;
}

/**
 * Correlation context for a single analysis run
 */
export interface RunContext {
  /**
   * Unique identifier for the run
   * Format: 'cli-{timestamp}' or a caller-chosen id
   */
  runId: string;

  /**
   * Current analysis pass (optional)
   * Examples: 'buildGraph', 'stages', 'criticalPath'
   */
  step?: string;
}

export type Logger = PinoLogger;
export type { LoggerOptions, Bindings };
