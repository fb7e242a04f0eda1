/**
 * Duration Estimator
 *
 * Heuristic job weights derived from step lists. The numbers rank jobs
 * against each other; they are not a prediction of wall-clock time.
 */

import {
  BUILD_ACTION_KEYWORDS,
  DURATION_HEURISTICS,
  INSTALL_COMMAND_KEYWORDS,
  SERIAL_ONLY_KEYWORDS,
  SETUP_ACTION_KEYWORDS,
} from "../constants/index.js";
import type { StepDescriptor } from "../schemas/index.js";

const containsAny = (text: string, keywords: readonly string[]): boolean =>
  keywords.some((keyword) => text.includes(keyword));

/**
 * Bonus seconds for a single step on top of the per-step base
 */
export function estimateStepBonus(step: StepDescriptor): number {
  if (typeof step === "string") {
    return 0;
  }

  if (step.uses !== undefined) {
    if (containsAny(step.uses, SETUP_ACTION_KEYWORDS)) {
      return DURATION_HEURISTICS.SETUP_OR_CACHE_ACTION;
    }
    if (containsAny(step.uses, BUILD_ACTION_KEYWORDS)) {
      return DURATION_HEURISTICS.BUILD_OR_TEST_ACTION;
    }
    return 0;
  }

  if (step.run !== undefined) {
    const command = step.run.toLowerCase();
    if (containsAny(command, INSTALL_COMMAND_KEYWORDS)) {
      return DURATION_HEURISTICS.INSTALL_COMMAND;
    }
    if (command.includes("build")) {
      return DURATION_HEURISTICS.BUILD_COMMAND;
    }
    if (command.includes("test")) {
      return DURATION_HEURISTICS.TEST_COMMAND;
    }
  }

  return 0;
}

/**
 * Estimated job duration in seconds: 30 per step plus keyword bonuses
 */
export function estimateJobDuration(steps: readonly StepDescriptor[]): number {
  return steps.reduce(
    (total, step) => total + estimateStepBonus(step),
    steps.length * DURATION_HEURISTICS.SECONDS_PER_STEP
  );
}

/**
 * A job can share a stage with others unless a step deploys or releases
 */
export function canParallelizeJob(steps: readonly StepDescriptor[]): boolean {
  return !steps.some(
    (step) =>
      typeof step !== "string" && containsAny(JSON.stringify(step).toLowerCase(), SERIAL_ONLY_KEYWORDS)
  );
}
