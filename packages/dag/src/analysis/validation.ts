/**
 * Validation Pass
 *
 * Cycle detection gates every duration-weighted computation. Redundancy
 * detection only reports; RedundancyOptimizer applies it.
 */

import type { DependencyGraph } from "../graph/index.js";
import type { CircularDependencyIssue, RedundantDependencyIssue } from "../types/index.js";

/**
 * Every simple cycle of the graph
 */
export function findCycles(graph: DependencyGraph): string[][] {
  return graph.simpleCycles();
}

export function circularDependencyIssue(cycle: string[]): CircularDependencyIssue {
  return {
    type: "circular_dependency",
    severity: "high",
    cycle,
    message: `Circular dependency detected: ${[...cycle, cycle[0]].join(" -> ")}`,
    suggestion: "Remove or restructure dependencies to eliminate the cycle",
  };
}

/**
 * One CircularDependency issue per simple cycle; empty for a DAG
 */
export function validateGraph(graph: DependencyGraph): CircularDependencyIssue[] {
  return findCycles(graph).map(circularDependencyIssue);
}

/**
 * Memoized ancestor lookup for repeated queries against one graph
 */
export function createAncestorLookup(graph: DependencyGraph): (job: string) => Set<string> {
  const cache = new Map<string, Set<string>>();
  return (job) => {
    let ancestors = cache.get(job);
    if (!ancestors) {
      ancestors = graph.ancestors(job);
      cache.set(job, ancestors);
    }
    return ancestors;
  };
}

/**
 * Redundant direct dependencies of one job.
 *
 * For direct dependencies d1 ≠ d2, the edge to d2 is redundant when d2
 * is an ancestor of d1. The result maps each redundant d2 to all of its
 * d1 witnesses, both in the order of `direct`.
 */
export function findRedundantCandidates(
  direct: readonly string[],
  ancestorsOf: (job: string) => Set<string>
): Map<string, string[]> {
  const redundant = new Map<string, string[]>();
  if (direct.length < 2) {
    return redundant;
  }

  for (const dependency of direct) {
    const impliedBy = direct.filter(
      (other) => other !== dependency && ancestorsOf(other).has(dependency)
    );
    if (impliedBy.length > 0) {
      redundant.set(dependency, impliedBy);
    }
  }
  return redundant;
}

export function redundantDependencyIssue(
  job: string,
  dependency: string,
  impliedBy: string[]
): RedundantDependencyIssue {
  return {
    type: "redundant_dependency",
    severity: "low",
    job,
    dependency,
    impliedBy,
    message: `Job '${job}' has redundant dependency on '${dependency}'`,
    suggestion: `Remove '${dependency}' from needs as it's implied by ${impliedBy.map((name) => `'${name}'`).join(", ")}`,
  };
}

/**
 * Report every redundant direct dependency in the graph
 */
export function findRedundantDependencies(graph: DependencyGraph): RedundantDependencyIssue[] {
  const ancestorsOf = createAncestorLookup(graph);
  const issues: RedundantDependencyIssue[] = [];

  for (const job of graph.nodes) {
    const candidates = findRedundantCandidates(graph.predecessors(job), ancestorsOf);
    for (const [dependency, impliedBy] of candidates) {
      issues.push(redundantDependencyIssue(job, dependency, impliedBy));
    }
  }
  return issues;
}
