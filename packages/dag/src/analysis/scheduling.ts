/**
 * Scheduling Analyzer
 *
 * Execution stages, duration-weighted critical path, time bounds and
 * bottlenecks. Every weighted computation returns an empty answer on a
 * cyclic graph instead of an approximation.
 */

import { ANALYSIS_DEFAULTS } from "../constants/index.js";
import type { DependencyGraph } from "../graph/index.js";
import type { AnalyzedJob } from "../schemas/index.js";
import type { CriticalPathResult, SplitBottleneckJobSuggestion } from "../types/index.js";

/**
 * Job name → weight in seconds
 */
export type WeightMap = ReadonlyMap<string, number>;

/**
 * Weights for the given jobs; a missing or zero estimate takes the default
 */
export function buildWeightMap(
  jobs: Iterable<Pick<AnalyzedJob, "name" | "estimatedDuration">>,
  defaultDuration: number = ANALYSIS_DEFAULTS.DEFAULT_DURATION_SECONDS
): Map<string, number> {
  const weights = new Map<string, number>();
  for (const job of jobs) {
    weights.set(job.name, job.estimatedDuration > 0 ? job.estimatedDuration : defaultDuration);
  }
  return weights;
}

const weightLookup =
  (weights: WeightMap, defaultDuration: number) =>
  (job: string): number =>
    weights.get(job) ?? defaultDuration;

/**
 * Parallel execution stages (topological generations); `[]` when cyclic
 */
export function computeExecutionStages(graph: DependencyGraph): string[][] {
  return graph.topologicalGenerations() ?? [];
}

/**
 * Longest duration-weighted chain.
 *
 * `start[n]` is the heaviest path ending just before n; it is relaxed
 * along the topological order with a predecessor pointer kept on every
 * strict improvement. The path ends at the job with the largest `start`,
 * the first such job in topological order on ties, and its duration is
 * the sum of the weights along it.
 */
export function findCriticalPath(
  graph: DependencyGraph,
  weights: WeightMap,
  defaultDuration: number = ANALYSIS_DEFAULTS.DEFAULT_DURATION_SECONDS
): CriticalPathResult {
  const stages = graph.topologicalGenerations();
  if (!stages || graph.size === 0) {
    return { path: [], duration: 0 };
  }

  const weightOf = weightLookup(weights, defaultDuration);
  const order = stages.flat();
  const start = new Map<string, number>(order.map((job) => [job, 0]));
  const predecessor = new Map<string, string>();

  for (const job of order) {
    const finish = (start.get(job) ?? 0) + weightOf(job);
    for (const successor of graph.successors(job)) {
      if (finish > (start.get(successor) ?? 0)) {
        start.set(successor, finish);
        predecessor.set(successor, job);
      }
    }
  }

  let end = order[0];
  for (const job of order) {
    if ((start.get(job) ?? 0) > (start.get(end) ?? 0)) {
      end = job;
    }
  }

  const path: string[] = [];
  let current: string | undefined = end;
  while (current !== undefined) {
    path.unshift(current);
    current = predecessor.get(current);
  }

  return { path, duration: path.reduce((total, job) => total + weightOf(job), 0) };
}

/**
 * Time if every job ran one after another
 */
export function calculateSerialTime(
  graph: DependencyGraph,
  weights: WeightMap,
  defaultDuration: number = ANALYSIS_DEFAULTS.DEFAULT_DURATION_SECONDS
): number {
  const weightOf = weightLookup(weights, defaultDuration);
  return graph.nodes.reduce((total, job) => total + weightOf(job), 0);
}

/**
 * Lower bound with unlimited parallelism and no overlap between stages:
 * the sum of each stage's slowest job
 */
export function calculateParallelTime(
  stages: readonly string[][],
  weights: WeightMap,
  defaultDuration: number = ANALYSIS_DEFAULTS.DEFAULT_DURATION_SECONDS
): number {
  const weightOf = weightLookup(weights, defaultDuration);
  return stages.reduce(
    (total, stage) => total + Math.max(0, ...stage.map((job) => weightOf(job))),
    0
  );
}

/**
 * Jobs that block many dependents, or that alone gate the next stage
 */
export function identifyBottlenecks(
  graph: DependencyGraph,
  stages: readonly string[][],
  outDegreeThreshold: number = ANALYSIS_DEFAULTS.BOTTLENECK_OUT_DEGREE
): string[] {
  const bottlenecks = graph.nodes.filter((job) => graph.outDegree(job) >= outDegreeThreshold);

  for (const stage of stages) {
    const [only] = stage;
    if (stage.length === 1 && graph.outDegree(only) > 0 && !bottlenecks.includes(only)) {
      bottlenecks.push(only);
    }
  }

  return bottlenecks;
}

/**
 * Suggest splitting bottlenecks that carry many steps
 */
export function suggestBottleneckSplits(
  bottlenecks: readonly string[],
  jobs: Readonly<Record<string, Pick<AnalyzedJob, "steps">>>,
  minSteps: number = ANALYSIS_DEFAULTS.SPLIT_BOTTLENECK_MIN_STEPS
): SplitBottleneckJobSuggestion[] {
  const suggestions: SplitBottleneckJobSuggestion[] = [];
  for (const job of bottlenecks) {
    const stepCount = jobs[job]?.steps.length ?? 0;
    if (stepCount >= minSteps) {
      suggestions.push({
        type: "split_bottleneck_job",
        severity: "medium",
        job,
        stepCount,
        message: `Job '${job}' is a bottleneck with ${stepCount} steps`,
        suggestion: "Consider splitting this job into smaller, parallel jobs",
      });
    }
  }
  return suggestions;
}
