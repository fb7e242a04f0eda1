/**
 * Workflow Analyzer
 *
 * Runs every pass over one job map and collects the results. Structural
 * issues are always reported; a cycle empties the weighted results but
 * advisory passes still run.
 */

import { getContextLogger, runStep } from "@jobgraph/core";
import { resolveAnalysisConfig, type AnalysisOptions } from "../config/index.js";
import type { JobMapInput } from "../schemas/index.js";
import type { AnalysisResult, DependencyIssue, OptimizationSuggestion } from "../types/index.js";
import { extractJobs, parseJobMap, toDependencyMap } from "./contract.js";
import { buildDependencyGraph } from "./graph-builder.js";
import {
  findParallelGroups,
  suggestIndependentPairs,
  suggestLargeJobs,
  suggestLongChain,
} from "./parallelization.js";
import {
  buildWeightMap,
  calculateParallelTime,
  calculateSerialTime,
  computeExecutionStages,
  findCriticalPath,
  identifyBottlenecks,
  suggestBottleneckSplits,
} from "./scheduling.js";
import { findRedundantDependencies, validateGraph } from "./validation.js";

/**
 * Analyze a job map
 *
 * @throws {ContractViolationError} When the job map is malformed
 * @throws {ConfigurationError} When an option is out of range
 */
export function analyzeJobs(input: JobMapInput, options: AnalysisOptions = {}): AnalysisResult {
  const config = resolveAnalysisConfig(options);
  const logger = getContextLogger();

  const jobs = runStep("extractJobs", () => extractJobs(parseJobMap(input)));
  const dependencies = toDependencyMap(jobs);
  const { graph, issues: missing } = runStep("buildGraph", () => buildDependencyGraph(dependencies));
  const cycles = runStep("validate", () => validateGraph(graph));
  const hasCycles = cycles.length > 0;

  if (hasCycles) {
    logger.debug({ cycles: cycles.length }, "Cycles found, weighted analysis skipped");
  }

  const weights = buildWeightMap(Object.values(jobs), config.defaultDurationSeconds);
  const executionStages = runStep("stages", () => computeExecutionStages(graph));
  const criticalPath = runStep("criticalPath", () =>
    findCriticalPath(graph, weights, config.defaultDurationSeconds)
  );
  const bottlenecks = identifyBottlenecks(graph, executionStages, config.bottleneckOutDegree);

  const redundant = runStep("redundancy", () => findRedundantDependencies(graph));
  const issues: DependencyIssue[] = [...missing, ...cycles, ...redundant];

  const suggestions: OptimizationSuggestion[] = runStep("suggestions", () => [
    ...suggestIndependentPairs(graph, executionStages),
    ...suggestBottleneckSplits(bottlenecks, jobs, config.splitBottleneckMinSteps),
    ...suggestLongChain(graph, config.longChainMinNodes),
    ...suggestLargeJobs(Object.values(jobs), config.largeJobMinSteps),
  ]);

  const result: AnalysisResult = {
    jobs,
    edges: graph.edges(),
    executionStages,
    criticalPath: criticalPath.path,
    criticalPathDuration: criticalPath.duration,
    totalSerialTime: calculateSerialTime(graph, weights, config.defaultDurationSeconds),
    optimalParallelTime: calculateParallelTime(executionStages, weights, config.defaultDurationSeconds),
    bottlenecks,
    issues,
    suggestions,
    parallelGroups: findParallelGroups(graph, executionStages, dependencies),
    hasCycles,
  };

  logger.debug(
    {
      jobs: graph.size,
      edges: result.edges.length,
      stages: executionStages.length,
      issues: issues.length,
      suggestions: suggestions.length,
    },
    "Dependency analysis complete"
  );
  return result;
}
