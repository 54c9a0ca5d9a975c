/**
 * @fileoverview Structured single-line logging for git command execution.
 *
 * Exports:
 * - GitLogLevel (L9) - Supported log levels.
 * - logGitEvent (L13) - Writes one JSON log line through console.
 */

export type GitLogLevel = "debug" | "info" | "warn" | "error";

const LOG_SCOPE = "git";

export const logGitEvent = (level: GitLogLevel, payload: Record<string, unknown>): void => {
  /* One JSON object per line keeps logs greppable and machine-readable. */
  const line = JSON.stringify({ level, scope: LOG_SCOPE, ...payload });

  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  if (level === "debug") {
    console.debug(line);
    return;
  }
  console.log(line);
};
