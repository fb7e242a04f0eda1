/**
 * Analysis configuration
 */

import { z } from "zod";
import { BaseConfigSchema, ConfigurationError, loadConfig, type EnvSource } from "@jobgraph/core";
import { ANALYSIS_DEFAULTS } from "../constants/index.js";

export const AnalysisConfigSchema = BaseConfigSchema.extend({
  /** Weight for jobs whose estimated duration is absent or zero, in seconds */
  defaultDurationSeconds: z.number().int().positive().default(ANALYSIS_DEFAULTS.DEFAULT_DURATION_SECONDS),

  /** Out-degree at which a job counts as a bottleneck */
  bottleneckOutDegree: z.number().int().positive().default(ANALYSIS_DEFAULTS.BOTTLENECK_OUT_DEGREE),

  /** Minimum job count of a reported long dependency chain */
  longChainMinNodes: z.number().int().min(2).default(ANALYSIS_DEFAULTS.LONG_CHAIN_MIN_NODES),

  /** Minimum step count of a bottleneck worth splitting */
  splitBottleneckMinSteps: z.number().int().positive().default(ANALYSIS_DEFAULTS.SPLIT_BOTTLENECK_MIN_STEPS),

  /** Minimum step count of a job reported as large */
  largeJobMinSteps: z.number().int().positive().default(ANALYSIS_DEFAULTS.LARGE_JOB_MIN_STEPS),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

/**
 * Per-call overrides; anything left out takes the default
 */
export type AnalysisOptions = z.input<typeof AnalysisConfigSchema>;

const ANALYSIS_ENV_MAPPING = {
  defaultDurationSeconds: "JOBGRAPH_DEFAULT_DURATION",
  bottleneckOutDegree: "JOBGRAPH_BOTTLENECK_OUT_DEGREE",
  longChainMinNodes: "JOBGRAPH_LONG_CHAIN_MIN_NODES",
  splitBottleneckMinSteps: "JOBGRAPH_SPLIT_BOTTLENECK_MIN_STEPS",
  largeJobMinSteps: "JOBGRAPH_LARGE_JOB_MIN_STEPS",
};

/**
 * Load analysis configuration from `JOBGRAPH_*` environment variables
 */
export function loadAnalysisConfig(env: EnvSource = process.env): AnalysisConfig {
  return loadConfig(AnalysisConfigSchema, ANALYSIS_ENV_MAPPING, env);
}

/**
 * Merge per-call overrides over the defaults
 *
 * @throws {ConfigurationError} When an override is out of range
 */
export function resolveAnalysisConfig(options: AnalysisOptions = {}): AnalysisConfig {
  const parsed = AnalysisConfigSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid analysis options: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      parsed.error.issues.map((issue) => issue.path.join("."))
    );
  }
  return parsed.data;
}
