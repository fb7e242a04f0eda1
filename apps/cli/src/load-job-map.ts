/**
 * Job map loading for CLI commands
 */

import { existsSync, readFileSync } from "node:fs";
import { JobGraphError } from "@jobgraph/core";
import { parseJobMap, type JobMap } from "@jobgraph/dag";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * The job map inside a parsed document: the `jobs` object of a workflow
 * document, or the document itself
 */
export function selectJobMap(document: unknown): unknown {
  if (isRecord(document) && isRecord(document.jobs)) {
    return document.jobs;
  }
  return document;
}

/**
 * Read and validate a JSON job map
 *
 * @throws {JobGraphError} When the file is missing or not JSON
 * @throws {ContractViolationError} When the job map is malformed
 */
export function loadJobMap(path: string): JobMap {
  if (!existsSync(path)) {
    throw new JobGraphError(`Input file not found: ${path}`, "INPUT_NOT_FOUND");
  }

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new JobGraphError(`Invalid JSON in ${path}: ${reason}`, "INVALID_INPUT");
  }

  return parseJobMap(selectJobMap(document));
}
