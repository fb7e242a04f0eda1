/**
 * Engine errors
 */

import { JobGraphError } from "@jobgraph/core";

/**
 * A single broken input invariant
 */
export interface ContractIssue {
  /** Dotted path into the job map, e.g. `build.needs.1.job` */
  path: string;
  message: string;
}

/**
 * Error thrown when the job map handed to the engine has not been
 * normalized the way the engine requires. The run is rejected as a whole.
 */
export class ContractViolationError extends JobGraphError {
  constructor(public readonly issues: ContractIssue[]) {
    super(
      `Invalid job map: ${issues.map((issue) => `${issue.path || "<root>"}: ${issue.message}`).join("; ")}`,
      "CONTRACT_VIOLATION"
    );
    this.name = "ContractViolationError";
  }
}
