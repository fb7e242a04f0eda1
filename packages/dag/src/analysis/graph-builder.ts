/**
 * Graph Builder
 *
 * Turns a normalized dependency map into a DependencyGraph. Dangling
 * names become MissingDependency issues and never become edges, so every
 * later pass runs on the largest graph that can actually be built.
 */

import { DependencyGraph } from "../graph/index.js";
import type { DependencyMap } from "../schemas/index.js";
import type { MissingDependencyIssue } from "../types/index.js";

export interface GraphBuildResult {
  graph: DependencyGraph;
  issues: MissingDependencyIssue[];
}

export function missingDependencyIssue(job: string, missing: string): MissingDependencyIssue {
  return {
    type: "missing_dependency",
    severity: "high",
    job,
    missing,
    message: `Job '${job}' depends on non-existent job '${missing}'`,
    suggestion: `Either create job '${missing}' or remove it from the needs list`,
  };
}

/**
 * Build the dependency graph: one node per job, one edge per resolvable
 * dependency (dependency → dependent)
 */
export function buildDependencyGraph(dependencies: DependencyMap): GraphBuildResult {
  const graph = new DependencyGraph();
  const issues: MissingDependencyIssue[] = [];

  for (const job of Object.keys(dependencies)) {
    graph.addNode(job);
  }

  for (const [job, needs] of Object.entries(dependencies)) {
    for (const dependency of new Set(needs)) {
      if (graph.hasNode(dependency)) {
        graph.addEdge(dependency, job);
      } else {
        issues.push(missingDependencyIssue(job, dependency));
      }
    }
  }

  return { graph, issues };
}
