/**
 * Dependency Optimizer
 *
 * Applies redundancy removal, then parallelization edge removal on the
 * rewritten map. The caller's job map is never modified.
 */

import { getContextLogger, runStep } from "@jobgraph/core";
import type { JobMapInput } from "../schemas/index.js";
import type { OptimizeResult } from "../types/index.js";
import { extractJobs, parseJobMap, toDependencyMap } from "./contract.js";
import { parallelizeJobs } from "./parallelization.js";
import { removeRedundantDependencies } from "./redundancy.js";

/**
 * Rewrite the job map's dependencies for maximum parallelism
 *
 * @throws {ContractViolationError} When the job map is malformed
 */
export function optimizeDependencies(input: JobMapInput): OptimizeResult {
  const dependencies = toDependencyMap(extractJobs(parseJobMap(input)));

  const reduced = runStep("removeRedundant", () => removeRedundantDependencies(dependencies));
  const parallelized = runStep("parallelize", () => parallelizeJobs(reduced.dependencies));

  const changes = [...reduced.changes, ...parallelized.changes];
  getContextLogger().debug({ changes: changes.length }, "Dependency optimization complete");

  return { dependencies: parallelized.dependencies, changes };
}
