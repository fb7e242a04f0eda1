/**
 * Input Contract
 *
 * The engine trusts nothing about its input shape: the job map is
 * checked once, up front, and a broken invariant rejects the whole run.
 */

import type { ZodError } from "zod";
import { ContractViolationError, type ContractIssue } from "../errors.js";
import { JobMapSchema, type AnalyzedJob, type DependencyMap, type JobMap } from "../schemas/index.js";
import { canParallelizeJob, estimateJobDuration } from "./duration-estimator.js";
import { normalizeNeeds } from "./needs.js";

function toContractIssues(error: ZodError): ContractIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Validate a job map
 *
 * @throws {ContractViolationError} With one entry per offending path
 */
export function parseJobMap(input: unknown): JobMap {
  const parsed = JobMapSchema.safeParse(input);
  if (!parsed.success) {
    throw new ContractViolationError(toContractIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Derive normalized needs, duration and parallelizability for every job
 */
export function extractJobs(jobMap: JobMap): Record<string, AnalyzedJob> {
  const jobs: Record<string, AnalyzedJob> = {};
  for (const [name, record] of Object.entries(jobMap)) {
    jobs[name] = {
      name,
      needs: normalizeNeeds(record.needs),
      steps: record.steps,
      estimatedDuration: record.estimatedDuration ?? estimateJobDuration(record.steps),
      canParallelize: canParallelizeJob(record.steps),
      metadata: record,
    };
  }
  return jobs;
}

/**
 * Job name → normalized dependency names
 */
export function toDependencyMap(jobs: Record<string, Pick<AnalyzedJob, "needs">>): DependencyMap {
  return Object.fromEntries(Object.entries(jobs).map(([name, job]) => [name, [...job.needs]]));
}
