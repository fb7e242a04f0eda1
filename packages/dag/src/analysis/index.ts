/**
 * Dependency graph engine passes
 */

export { normalizeNeeds, dependencySetKey } from "./needs.js";
export { estimateJobDuration, estimateStepBonus, canParallelizeJob } from "./duration-estimator.js";
export { parseJobMap, extractJobs, toDependencyMap } from "./contract.js";
export { buildDependencyGraph, missingDependencyIssue, type GraphBuildResult } from "./graph-builder.js";
export {
  findCycles,
  validateGraph,
  findRedundantDependencies,
  findRedundantCandidates,
  createAncestorLookup,
} from "./validation.js";
export {
  buildWeightMap,
  computeExecutionStages,
  findCriticalPath,
  calculateSerialTime,
  calculateParallelTime,
  identifyBottlenecks,
  suggestBottleneckSplits,
  type WeightMap,
} from "./scheduling.js";
export {
  removeRedundantDependencies,
  planRedundantRemovals,
  confirmRemovals,
  copyDependencyMap,
} from "./redundancy.js";
export {
  findSameStageGroups,
  findIdenticalDependencyGroups,
  findParallelGroups,
  suggestIndependentPairs,
  findLongestChain,
  suggestLongChain,
  suggestLargeJobs,
  parallelizeJobs,
} from "./parallelization.js";
export { analyzeJobs } from "./analyzer.js";
export { optimizeDependencies } from "./optimizer.js";
