/**
 * Redundancy Optimizer
 *
 * Removes declared dependencies that other declared dependencies
 * already imply. Reachability of the graph is unchanged by every
 * removal, since the implying path stays in place.
 */

import { getContextLogger } from "@jobgraph/core";
import type { DependencyGraph } from "../graph/index.js";
import type { DependencyMap } from "../schemas/index.js";
import type { DependencyChange, OptimizeResult } from "../types/index.js";
import { buildDependencyGraph } from "./graph-builder.js";
import { createAncestorLookup, findRedundantCandidates } from "./validation.js";

/**
 * Deep copy of a dependency map
 */
export function copyDependencyMap(dependencies: DependencyMap): DependencyMap {
  return Object.fromEntries(
    Object.entries(dependencies).map(([job, needs]) => [job, [...needs]])
  );
}

/**
 * Confirm a batch of removal candidates for one job.
 *
 * The batch is taken as a whole against the direct-dependency set: a
 * candidate is confirmed only when it is an ancestor of a direct
 * dependency that is not itself a candidate. Unconfirmed candidates
 * stay, which only adds witnesses for the confirmed ones.
 */
export function confirmRemovals(
  direct: readonly string[],
  candidates: ReadonlySet<string>,
  ancestorsOf: (job: string) => Set<string>
): string[] {
  const remaining = direct.filter((dependency) => !candidates.has(dependency));
  return direct.filter(
    (dependency) =>
      candidates.has(dependency) &&
      remaining.some((other) => ancestorsOf(other).has(dependency))
  );
}

/**
 * Redundant dependencies each job can safely drop, in job order
 */
export function planRedundantRemovals(graph: DependencyGraph): Map<string, string[]> {
  const ancestorsOf = createAncestorLookup(graph);
  const plan = new Map<string, string[]>();

  for (const job of graph.nodes) {
    const direct = graph.predecessors(job);
    const candidates = findRedundantCandidates(direct, ancestorsOf);
    if (candidates.size === 0) {
      continue;
    }
    const confirmed = confirmRemovals(direct, new Set(candidates.keys()), ancestorsOf);
    if (confirmed.length > 0) {
      plan.set(job, confirmed);
    }
  }
  return plan;
}

/**
 * Drop redundant dependencies from every job's declared needs.
 *
 * Returns a new map and a change-log; `dependencies` is left untouched.
 * Names that are not jobs are never removed here.
 */
export function removeRedundantDependencies(dependencies: DependencyMap): OptimizeResult {
  const { graph } = buildDependencyGraph(dependencies);
  const plan = planRedundantRemovals(graph);
  const rewritten = copyDependencyMap(dependencies);
  const changes: DependencyChange[] = [];

  for (const [job, removed] of plan) {
    const drop = new Set(removed);
    rewritten[job] = rewritten[job].filter((dependency) => !drop.has(dependency));
    changes.push({
      job,
      removed,
      reason: "redundant_dependency",
      message: `Removed redundant dependencies from job '${job}'`,
    });
  }

  getContextLogger().debug({ changed: changes.length }, "Redundant dependency removal planned");
  return { dependencies: rewritten, changes };
}
