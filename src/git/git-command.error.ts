/**
 * @fileoverview Error raised when a git process cannot produce usable output.
 *
 * Exports:
 * - GitCommandFailureReason (L10) - Why the command failed.
 * - GitCommandErrorDetails (L17) - Context captured with the failure.
 * - GitCommandError (L48) - Error carrying command, exit status and stderr.
 */

export type GitCommandFailureReason =
  | "exit-status"
  | "timeout"
  | "signaled"
  | "output-limit"
  | "spawn";

export type GitCommandErrorDetails = {
  reason: GitCommandFailureReason;
  args: readonly string[];
  cwd: string;
  exitCode: number | null;
  signal: string | null;
  stderr: string;
};

const STDERR_PREVIEW_LENGTH = 500;

const describeFailure = (details: GitCommandErrorDetails): string => {
  const command = `git ${details.args.join(" ")}`;
  if (details.reason === "timeout") {
    return `${command} timed out (signal ${details.signal ?? "unknown"})`;
  }
  if (details.reason === "signaled") {
    return `${command} was terminated by signal ${details.signal ?? "unknown"}`;
  }
  if (details.reason === "output-limit") {
    return `${command} produced more output than the configured buffer allows`;
  }
  if (details.reason === "spawn") {
    return `${command} could not be started`;
  }

  const stderr = details.stderr.trim().slice(0, STDERR_PREVIEW_LENGTH);
  const suffix = stderr ? `: ${stderr}` : "";
  return `${command} exited with status ${details.exitCode ?? "unknown"}${suffix}`;
};

export class GitCommandError extends Error {
  public readonly reason: GitCommandFailureReason;
  public readonly args: readonly string[];
  public readonly cwd: string;
  public readonly exitCode: number | null;
  public readonly signal: string | null;
  public readonly stderr: string;

  public constructor(details: GitCommandErrorDetails, options?: { cause?: unknown }) {
    super(describeFailure(details), options);
    this.name = "GitCommandError";
    this.reason = details.reason;
    this.args = details.args;
    this.cwd = details.cwd;
    this.exitCode = details.exitCode;
    this.signal = details.signal;
    this.stderr = details.stderr;
  }
}
