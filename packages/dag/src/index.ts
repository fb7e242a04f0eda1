/**
 * @jobgraph/dag - Dependency graph engine
 *
 * Builds the dependency graph of a CI pipeline's jobs, validates it,
 * computes stages, critical path and bottlenecks, and rewrites
 * dependencies for maximum parallelism. Pure functions of the job map.
 */

// Analysis passes and entry points
export * from "./analysis/index.js";

// Graph
export * from "./graph/index.js";

// Schemas
export * from "./schemas/index.js";

// Result types
export type * from "./types/index.js";

// Constants
export * from "./constants/index.js";

// Configuration
export {
  AnalysisConfigSchema,
  loadAnalysisConfig,
  resolveAnalysisConfig,
  type AnalysisConfig,
  type AnalysisOptions,
} from "./config/index.js";

// Errors
export { ContractViolationError, type ContractIssue } from "./errors.js";
