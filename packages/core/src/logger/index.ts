/**
 * File: packages/core/src/logger/index.ts
 * Purpose: Public API exports for the jobgraph logging system
 * Relationships: Entry point for all logger functionality
 * Key Dependencies: factory.ts, context.ts, types.ts
 */

// Logger factory functions
export { getLogger, createLogger, resetLogger, resolveConfig } from './factory.js';

// Context management functions
export {
  getContext,
  getContextLogger,
  runAnalysis,
  runStep,
  runWithContext
} from './context.js';

// Type exports
export type {
  Logger,
  LoggerOptions,
  Bindings,
  LogLevel,
  LoggerConfig,
  RunContext,
  RotationConfig
} from './types.js';

export { LogLevels } from './types.js';
