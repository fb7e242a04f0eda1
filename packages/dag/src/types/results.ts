/**
 * Values returned to reporting and autofix collaborators
 */

import type { GraphEdge } from "../graph/index.js";
import type { AnalyzedJob, DependencyMap } from "../schemas/index.js";
import type { DependencyIssue } from "./issues.js";
import type { OptimizationSuggestion } from "./suggestions.js";

export interface CriticalPathResult {
  path: string[];
  /** Sum of the weights of the jobs on the path, in seconds */
  duration: number;
}

/**
 * Jobs that could run side by side
 */
export interface ParallelGroup {
  jobs: string[];
  source: "same_stage" | "identical_dependencies";
  /** True while direct edges still connect members of the group */
  serialized: boolean;
}

export interface AnalysisResult {
  jobs: Record<string, AnalyzedJob>;
  edges: GraphEdge[];
  executionStages: string[][];
  criticalPath: string[];
  criticalPathDuration: number;
  totalSerialTime: number;
  optimalParallelTime: number;
  bottlenecks: string[];
  issues: DependencyIssue[];
  suggestions: OptimizationSuggestion[];
  parallelGroups: ParallelGroup[];
  hasCycles: boolean;
}

export type DependencyChangeReason = "redundant_dependency" | "enable_parallelization";

export interface DependencyChange {
  job: string;
  removed: string[];
  reason: DependencyChangeReason;
  message: string;
}

export interface OptimizeResult {
  /** Rewritten job → dependency-name map; a fresh copy */
  dependencies: DependencyMap;
  /** Changes in the order they were applied */
  changes: DependencyChange[];
}
