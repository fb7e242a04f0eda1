/**
 * File: packages/core/src/logger/context.ts
 * Purpose: AsyncLocalStorage-based context propagation for run IDs and pass names
 * Relationships: Provides context to all logger calls within an analysis run
 * Key Dependencies: async_hooks (Node.js native), factory.ts
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { Logger } from 'pino';
import { getLogger } from './factory.js';
import type { RunContext } from './types.js';

const runContext = new AsyncLocalStorage<RunContext>();

/**
 * Get the current run context, or undefined outside a run
 */
export function getContext(): RunContext | undefined {
  return runContext.getStore();
}

/**
 * Get a logger with current run context
 *
 * Returns a child logger with runId and step bindings from
 * AsyncLocalStorage. If no context is available, returns the base logger.
 *
 * @example
 * ```typescript
 * runAnalysis('cli-1703251200000', () => {
 *   runStep('stages', () => {
 *     getContextLogger().debug('Peeling generations');  // runId + step
 *   });
 * });
 * ```
 */
export function getContextLogger(): Logger {
  const context = getContext();
  if (context) {
    return getLogger().child(context);
  }
  return getLogger();
}

/**
 * Execute a function with custom context
 *
 * Works for both synchronous and promise-returning functions; the
 * context is visible to everything the function calls.
 */
export function runWithContext<T>(context: RunContext, fn: () => T): T {
  return runContext.run(context, fn);
}

/**
 * Execute a function within a run context (run ID)
 *
 * @example
 * ```typescript
 * const result = runAnalysis(`cli-${Date.now()}`, () => analyzeJobs(jobs));
 * ```
 */
export function runAnalysis<T>(runId: string, fn: () => T): T {
  return runWithContext({ runId }, fn);
}

/**
 * Execute a function with step context
 *
 * Inside a run, the step name is added to the run's context; nested
 * calls replace it. Outside a run the function executes unchanged, so
 * library callers that never opened a run are unaffected.
 */
export function runStep<T>(stepName: string, fn: () => T): T {
  const context = getContext();
  if (!context) {
    return fn();
  }

  return runContext.run({ ...context, step: stepName }, fn);
}
