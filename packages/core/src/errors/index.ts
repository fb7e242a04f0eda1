/**
 * Base error classes shared by jobgraph packages
 */

/**
 * Base error class for jobgraph errors
 */
export class JobGraphError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = "JobGraphError";
  }
}

/**
 * Error thrown when configuration fails validation
 */
export class ConfigurationError extends JobGraphError {
  constructor(
    message: string,
    public readonly invalidKeys: string[]
  ) {
    super(message, "CONFIGURATION");
    this.name = "ConfigurationError";
  }
}
