/**
 * File: packages/core/src/logger/factory.ts
 * Purpose: Logger factory with singleton pattern and environment-based configuration
 * Relationships: Core logger creation, used by all packages
 * Key Dependencies: pino, pino-pretty (dev), pino-roll (rotation)
 */

import pino, { type Logger, type LoggerOptions, type TransportTargetOptions } from 'pino';
import path from 'node:path';
import { LogLevels, type LoggerConfig, type LogLevel } from './types.js';

type ResolvedLoggerConfig = Required<Omit<LoggerConfig, 'name' | 'rotation'>> & {
  name?: string;
  rotation: {
    enabled: boolean;
    frequency: 'daily' | 'hourly';
    maxSize: string;
    retention: number;
  };
};

/**
 * Singleton logger instance
 */
let instance: Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LogLevels, value);
}

/**
 * Build transport configuration based on environment and config
 */
export function buildTransportTargets(config: ResolvedLoggerConfig): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [];

  if (config.toFile && config.rotation.enabled) {
    targets.push({
      target: 'pino-roll',
      level: config.level,
      options: {
        file: path.resolve(config.filePath),
        frequency: config.rotation.frequency,
        size: config.rotation.maxSize,
        mkdir: true,
        limit: { count: config.rotation.retention }
      }
    });
  }

  if (config.pretty) {
    targets.push({
      target: 'pino-pretty',
      level: config.level,
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
        // stderr, so JSON written by the CLI to stdout stays parseable
        destination: 2
      }
    });
  } else {
    targets.push({
      target: 'pino/file',
      level: config.level,
      options: {
        destination: 2
      }
    });
  }

  return targets;
}

/**
 * Resolve configuration from environment and provided config
 */
export function resolveConfig(config?: LoggerConfig): ResolvedLoggerConfig {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const isTest = process.env.NODE_ENV === 'test';
  const envLevel = process.env.LOG_LEVEL;

  return {
    level: config?.level ?? (isLogLevel(envLevel) ? envLevel : isDevelopment ? 'debug' : 'info'),
    toFile: config?.toFile ?? (process.env.LOG_TO_FILE === 'true'),
    filePath: config?.filePath || process.env.LOG_FILE_PATH || './logs/jobgraph.log',
    pretty: config?.pretty ?? (isDevelopment && !process.env.CI),
    rotation: {
      enabled: config?.rotation?.enabled ?? true,
      frequency: config?.rotation?.frequency || 'daily',
      maxSize: config?.rotation?.maxSize || '50m',
      retention: config?.rotation?.retention || 14
    },
    name: config?.name,
    enabled: config?.enabled ?? !isTest
  };
}

/**
 * Create a new logger with custom configuration
 *
 * Does not affect the singleton instance.
 *
 * @example
 * ```typescript
 * const quiet = createLogger({ enabled: false });
 * const verbose = createLogger({ level: 'debug', pretty: true });
 * ```
 */
export function createLogger(config?: LoggerConfig): Logger {
  const resolvedConfig = resolveConfig(config);

  if (!resolvedConfig.enabled) {
    return pino({ level: 'silent', enabled: false });
  }

  const options: LoggerOptions = {
    level: resolvedConfig.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: { targets: buildTransportTargets(resolvedConfig) }
  };

  if (resolvedConfig.name !== undefined) {
    options.name = resolvedConfig.name;
  }

  return pino(options);
}

/**
 * Get the singleton logger instance
 *
 * Lazily creates logger on first call using environment configuration.
 *
 * @param config - Optional configuration (only used on first call)
 *
 * @example
 * ```typescript
 * import { getLogger } from '@jobgraph/core';
 *
 * const logger = getLogger();
 * logger.info({ jobs: 12 }, 'Analysis started');
 * ```
 */
export function getLogger(config?: LoggerConfig): Logger {
  if (!instance) {
    instance = createLogger(config);
  }
  return instance;
}

/**
 * Reset the singleton logger instance
 *
 * Primarily for testing. The next call to getLogger() creates a fresh instance.
 */
export function resetLogger(): void {
  instance = null;
}
