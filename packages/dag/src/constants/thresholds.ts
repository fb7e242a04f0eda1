/**
 * Analysis Thresholds
 *
 * Default limits used when classifying bottlenecks and emitting
 * optimization suggestions. Every value can be overridden through
 * the analysis configuration.
 */

export const ANALYSIS_DEFAULTS = {
  /**
   * Weight given to a job whose estimated duration is absent or zero
   */
  DEFAULT_DURATION_SECONDS: 60,

  /**
   * Out-degree at which a job counts as a bottleneck
   */
  BOTTLENECK_OUT_DEGREE: 3,

  /**
   * Chains with at least this many jobs are reported as long
   */
  LONG_CHAIN_MIN_NODES: 5,

  /**
   * Bottlenecks with at least this many steps get a split suggestion
   */
  SPLIT_BOTTLENECK_MIN_STEPS: 6,

  /**
   * Any job with at least this many steps gets a large-job suggestion
   */
  LARGE_JOB_MIN_STEPS: 11,
} as const;

/**
 * Heuristic duration weights, in seconds
 */
export const DURATION_HEURISTICS = {
  SECONDS_PER_STEP: 30,

  // Action-style steps (`uses`)
  SETUP_OR_CACHE_ACTION: 30,
  BUILD_OR_TEST_ACTION: 120,

  // Command-style steps (`run`)
  INSTALL_COMMAND: 60,
  BUILD_COMMAND: 120,
  TEST_COMMAND: 90,
} as const;

export const SETUP_ACTION_KEYWORDS = ["setup-", "cache"] as const;
export const BUILD_ACTION_KEYWORDS = ["build", "test"] as const;
export const INSTALL_COMMAND_KEYWORDS = ["npm install", "yarn install"] as const;

/**
 * Steps mentioning any of these must not run alongside other jobs
 */
export const SERIAL_ONLY_KEYWORDS = ["deploy", "release"] as const;
