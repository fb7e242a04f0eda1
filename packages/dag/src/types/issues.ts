/**
 * Dependency issues found while building and validating the graph
 */

export type IssueSeverity = "high" | "medium" | "low";

interface IssueBase {
  severity: IssueSeverity;
  message: string;
  suggestion: string;
}

/**
 * A simple cycle, members in edge direction, starting at its earliest job
 */
export interface CircularDependencyIssue extends IssueBase {
  type: "circular_dependency";
  cycle: string[];
}

/**
 * A `needs` entry naming a job that does not exist
 */
export interface MissingDependencyIssue extends IssueBase {
  type: "missing_dependency";
  job: string;
  missing: string;
}

/**
 * A direct dependency already implied by other direct dependencies
 */
export interface RedundantDependencyIssue extends IssueBase {
  type: "redundant_dependency";
  job: string;
  dependency: string;
  /** Every direct dependency of `job` that has `dependency` as an ancestor */
  impliedBy: string[];
}

export type DependencyIssue =
  | CircularDependencyIssue
  | MissingDependencyIssue
  | RedundantDependencyIssue;

export type DependencyIssueType = DependencyIssue["type"];
