/**
 * Advisory optimization suggestions
 */

import type { IssueSeverity } from "./issues.js";

interface SuggestionBase {
  severity: IssueSeverity;
  message: string;
  suggestion: string;
}

export interface ParallelizeIndependentJobsSuggestion extends SuggestionBase {
  type: "parallelize_independent_jobs";
  /** Lexicographically ordered pair */
  jobs: [string, string];
}

export interface SplitBottleneckJobSuggestion extends SuggestionBase {
  type: "split_bottleneck_job";
  job: string;
  stepCount: number;
}

export interface LongDependencyChainSuggestion extends SuggestionBase {
  type: "long_dependency_chain";
  path: string[];
}

export interface LargeJobSuggestion extends SuggestionBase {
  type: "large_job";
  job: string;
  stepCount: number;
}

export type OptimizationSuggestion =
  | ParallelizeIndependentJobsSuggestion
  | SplitBottleneckJobSuggestion
  | LongDependencyChainSuggestion
  | LargeJobSuggestion;

export type OptimizationSuggestionType = OptimizationSuggestion["type"];
