/**
 * @fileoverview Environment parsing and configuration validation.
 *
 * Exports:
 * - DEFAULT_EXEC_TIMEOUT_MS (L15) - Default timeout for one git process.
 * - DEFAULT_MAX_BUFFER_BYTES (L16) - Default stdout/stderr limit.
 * - loadConfig (L52) - Load and validate config from environment.
 */

import { z } from "zod";

import { GitConfig } from "./config.types";

const DEFAULT_GIT_BINARY = "git";
const DEFAULT_EXEC_TIMEOUT_MS = 20_000;
const DEFAULT_MAX_BUFFER_BYTES = 10 * 1024 * 1024;

const envSchema = z.object({
  GIT_BINARY: z.string().trim().min(1).optional(),
  GIT_EXEC_TIMEOUT_MS: z.string().optional(),
  GIT_MAX_BUFFER_BYTES: z.string().optional(),
  GIT_LOG_COMMANDS: z.string().optional()
});

const parseOptionalBoolean = (value: string | undefined, name: string): boolean | undefined => {
  /* Parse optional boolean values from strings. */
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "y"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "n"].includes(normalized)) {
    return false;
  }
  throw new Error(`${name} must be a boolean: ${value}`);
};

const parseOptionalPositiveInt = (value: string | undefined, name: string): number | undefined => {
  /* Timeouts and buffer sizes are whole, non-zero amounts. */
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer: ${value}`);
  }
  return parsed;
};

export const loadConfig = (): GitConfig => {
  /* Validate known environment variables. */
  const env = envSchema.parse(process.env);

  return {
    gitBinary: env.GIT_BINARY ?? DEFAULT_GIT_BINARY,
    execTimeoutMs:
      parseOptionalPositiveInt(env.GIT_EXEC_TIMEOUT_MS, "GIT_EXEC_TIMEOUT_MS") ?? DEFAULT_EXEC_TIMEOUT_MS,
    maxBufferBytes:
      parseOptionalPositiveInt(env.GIT_MAX_BUFFER_BYTES, "GIT_MAX_BUFFER_BYTES") ?? DEFAULT_MAX_BUFFER_BYTES,
    logCommands: parseOptionalBoolean(env.GIT_LOG_COMMANDS, "GIT_LOG_COMMANDS") ?? false
  };
};

export { DEFAULT_EXEC_TIMEOUT_MS, DEFAULT_MAX_BUFFER_BYTES };
