/**
 * Parallelization Advisor
 *
 * Finds groups of jobs that could run side by side, proposes removing
 * the edges that still serialize such a group, and flags long chains
 * and oversized jobs.
 */

import { getContextLogger } from "@jobgraph/core";
import { ANALYSIS_DEFAULTS } from "../constants/index.js";
import type { DependencyGraph } from "../graph/index.js";
import type { AnalyzedJob, DependencyMap } from "../schemas/index.js";
import type {
  DependencyChange,
  LargeJobSuggestion,
  LongDependencyChainSuggestion,
  OptimizeResult,
  ParallelGroup,
  ParallelizeIndependentJobsSuggestion,
} from "../types/index.js";
import { buildDependencyGraph } from "./graph-builder.js";
import { dependencySetKey } from "./needs.js";
import { confirmRemovals, copyDependencyMap } from "./redundancy.js";
import { computeExecutionStages } from "./scheduling.js";
import { createAncestorLookup } from "./validation.js";

/**
 * Jobs of a stage that no other job of the same stage points at
 */
export function independentJobsOfStage(graph: DependencyGraph, stage: readonly string[]): string[] {
  return stage.filter(
    (job) => !stage.some((other) => other !== job && graph.hasEdge(other, job))
  );
}

/**
 * Stages holding at least two independent jobs
 */
export function findSameStageGroups(graph: DependencyGraph, stages: readonly string[][]): string[][] {
  return stages
    .map((stage) => independentJobsOfStage(graph, stage))
    .filter((group) => group.length >= 2);
}

/**
 * Jobs declaring the same set of dependency names, groups of two or more,
 * in order of first appearance
 */
export function findIdenticalDependencyGroups(dependencies: DependencyMap): string[][] {
  const groups = new Map<string, string[]>();
  for (const [job, needs] of Object.entries(dependencies)) {
    const key = dependencySetKey(needs);
    const group = groups.get(key);
    if (group) {
      group.push(job);
    } else {
      groups.set(key, [job]);
    }
  }
  return [...groups.values()].filter((group) => group.length >= 2);
}

/**
 * True when a direct edge joins two members of the group
 */
export function hasIntraGroupEdge(graph: DependencyGraph, jobs: readonly string[]): boolean {
  return jobs.some((from) => jobs.some((to) => from !== to && graph.hasEdge(from, to)));
}

/**
 * Union of same-stage and identical-dependency groups, deduplicated by job set
 */
export function findParallelGroups(
  graph: DependencyGraph,
  stages: readonly string[][],
  dependencies: DependencyMap
): ParallelGroup[] {
  const seen = new Set<string>();
  const groups: ParallelGroup[] = [];

  const add = (jobs: string[], source: ParallelGroup["source"]): void => {
    const key = dependencySetKey(jobs);
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    groups.push({ jobs, source, serialized: hasIntraGroupEdge(graph, jobs) });
  };

  findSameStageGroups(graph, stages).forEach((jobs) => add(jobs, "same_stage"));
  findIdenticalDependencyGroups(dependencies).forEach((jobs) => add(jobs, "identical_dependencies"));
  return groups;
}

/**
 * One suggestion per unordered pair of independent same-stage jobs that
 * share no descendant
 */
export function suggestIndependentPairs(
  graph: DependencyGraph,
  stages: readonly string[][]
): ParallelizeIndependentJobsSuggestion[] {
  const descendants = new Map<string, Set<string>>();
  const descendantsOf = (job: string): Set<string> => {
    let found = descendants.get(job);
    if (!found) {
      found = graph.descendants(job);
      descendants.set(job, found);
    }
    return found;
  };

  const suggestions: ParallelizeIndependentJobsSuggestion[] = [];
  for (const group of findSameStageGroups(graph, stages)) {
    const sorted = [...group].sort();
    for (let i = 0; i < sorted.length; i++) {
      for (let j = i + 1; j < sorted.length; j++) {
        const a = sorted[i];
        const b = sorted[j];
        const other = descendantsOf(b);
        const shared = [...descendantsOf(a)].some((job) => other.has(job));
        if (!shared) {
          suggestions.push({
            type: "parallelize_independent_jobs",
            severity: "medium",
            jobs: [a, b],
            message: `Jobs '${a}' and '${b}' could potentially run in parallel`,
            suggestion: "Review if these jobs truly need to run sequentially",
          });
        }
      }
    }
  }
  return suggestions;
}

/**
 * Longest path by hop count; the first such path in topological order.
 * Empty for an empty or cyclic graph.
 */
export function findLongestChain(graph: DependencyGraph): string[] {
  const stages = graph.topologicalGenerations();
  if (!stages || graph.size === 0) {
    return [];
  }

  const order = stages.flat();
  const hops = new Map<string, number>(order.map((job) => [job, 1]));
  const predecessor = new Map<string, string>();

  for (const job of order) {
    const length = (hops.get(job) ?? 1) + 1;
    for (const successor of graph.successors(job)) {
      if (length > (hops.get(successor) ?? 1)) {
        hops.set(successor, length);
        predecessor.set(successor, job);
      }
    }
  }

  let end = order[0];
  for (const job of order) {
    if ((hops.get(job) ?? 1) > (hops.get(end) ?? 1)) {
      end = job;
    }
  }

  const path: string[] = [];
  let current: string | undefined = end;
  while (current !== undefined) {
    path.unshift(current);
    current = predecessor.get(current);
  }
  return path;
}

/**
 * At most one suggestion, for the longest chain when it is long enough
 */
export function suggestLongChain(
  graph: DependencyGraph,
  minNodes: number = ANALYSIS_DEFAULTS.LONG_CHAIN_MIN_NODES
): LongDependencyChainSuggestion[] {
  const path = findLongestChain(graph);
  if (path.length < minNodes) {
    return [];
  }
  return [
    {
      type: "long_dependency_chain",
      severity: "low",
      path,
      message: `Long dependency chain: ${path.join(" -> ")}`,
      suggestion: "Consider restructuring to reduce sequential dependencies",
    },
  ];
}

/**
 * Jobs with enough steps to be worth splitting
 */
export function suggestLargeJobs(
  jobs: Iterable<Pick<AnalyzedJob, "name" | "steps">>,
  minSteps: number = ANALYSIS_DEFAULTS.LARGE_JOB_MIN_STEPS
): LargeJobSuggestion[] {
  const suggestions: LargeJobSuggestion[] = [];
  for (const job of jobs) {
    const stepCount = job.steps.length;
    if (stepCount >= minSteps) {
      suggestions.push({
        type: "large_job",
        severity: "low",
        job: job.name,
        stepCount,
        message: `Job '${job.name}' has ${stepCount} steps`,
        suggestion: "Consider splitting into smaller, parallel jobs for faster execution",
      });
    }
  }
  return suggestions;
}

/**
 * Remove the edges that serialize a parallel group.
 *
 * Only edges between members of one group are candidates, and each
 * job's candidates are confirmed as one batch under the same rule the
 * redundancy optimizer uses. Returns a new map and a change-log.
 */
export function parallelizeJobs(dependencies: DependencyMap): OptimizeResult {
  const rewritten = copyDependencyMap(dependencies);
  const changes: DependencyChange[] = [];

  const initial = buildDependencyGraph(dependencies).graph;
  const groups = findParallelGroups(initial, computeExecutionStages(initial), dependencies).filter(
    (group) => group.serialized
  );

  for (const group of groups) {
    const { graph } = buildDependencyGraph(rewritten);
    const ancestorsOf = createAncestorLookup(graph);
    const members = new Set(group.jobs);

    for (const job of group.jobs) {
      const direct = graph.predecessors(job);
      const candidates = new Set(direct.filter((dependency) => dependency !== job && members.has(dependency)));
      if (candidates.size === 0) {
        continue;
      }
      const removed = confirmRemovals(direct, candidates, ancestorsOf);
      if (removed.length === 0) {
        continue;
      }
      const drop = new Set(removed);
      rewritten[job] = rewritten[job].filter((dependency) => !drop.has(dependency));
      changes.push({
        job,
        removed,
        reason: "enable_parallelization",
        message: `Enabled parallel execution for job '${job}'`,
      });
    }
  }

  getContextLogger().debug(
    { groups: groups.length, changed: changes.length },
    "Parallelization edge removal planned"
  );
  return { dependencies: rewritten, changes };
}
