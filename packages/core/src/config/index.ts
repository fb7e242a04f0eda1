/**
 * Configuration management for jobgraph packages
 */

import { z } from "zod";
import { ConfigurationError } from "../errors/index.js";

/**
 * Base configuration schema that every package config extends
 */
export const BaseConfigSchema = z.object({
  /** Log level */
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;

export type EnvSource = Record<string, string | undefined>;

/**
 * Maps a config key to the environment variable it is read from
 */
export type EnvMapping = Record<string, string>;

const BASE_ENV_MAPPING: EnvMapping = {
  logLevel: "LOG_LEVEL",
};

/**
 * Coerce a raw environment string: numeric strings become numbers,
 * "true"/"false" become booleans, anything else stays a string.
 */
function coerceEnvValue(raw: string): unknown {
  const trimmed = raw.trim();
  if (trimmed === "true") return true;
  if (trimmed === "false") return false;
  if (trimmed !== "" && !Number.isNaN(Number(trimmed))) return Number(trimmed);
  return trimmed;
}

/**
 * Load configuration from environment variables
 *
 * Keys absent from the environment fall back to the schema defaults.
 *
 * @throws {ConfigurationError} When a value fails the schema
 */
export function loadConfig<T extends z.ZodTypeAny>(
  schema: T,
  mapping: EnvMapping = {},
  env: EnvSource = process.env
): z.infer<T> {
  const configFromEnv: Record<string, unknown> = {};

  for (const [key, variable] of Object.entries({ ...BASE_ENV_MAPPING, ...mapping })) {
    const raw = env[variable];
    if (raw !== undefined) {
      configFromEnv[key] = key === "logLevel" ? raw : coerceEnvValue(raw);
    }
  }

  const parsed = schema.safeParse(configFromEnv);
  if (!parsed.success) {
    const invalidKeys = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigurationError(
      `Invalid configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      invalidKeys
    );
  }
  return parsed.data;
}

/**
 * Load base configuration
 */
export function loadBaseConfig(env: EnvSource = process.env): BaseConfig {
  return loadConfig(BaseConfigSchema, {}, env);
}
