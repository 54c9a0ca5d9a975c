/**
 * @fileoverview Types and DI token for git command configuration.
 *
 * Exports:
 * - GitConfig (L9) - Validated configuration shape.
 * - ConfigToken (L20) - Injection token for config provider.
 */

export type GitConfig = {
  /** Executable used for every git invocation (absolute path or name on PATH). */
  gitBinary: string;
  /** Hard limit for one git process; the process is killed after it. */
  execTimeoutMs: number;
  /** Largest stdout/stderr size accepted from one git process. */
  maxBufferBytes: number;
  /** If true, every git command is logged with its duration. */
  logCommands: boolean;
};

export const ConfigToken = Symbol("GIT_CONFIG");
