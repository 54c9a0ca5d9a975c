/**
 * @fileoverview Executes git as a child process with timeout and buffer limits.
 *
 * Exports:
 * - GitCommandResult (L23) - Exit code and captured output of one git process.
 * - GitCommandExecutor (L29) - Contract used by services to run git.
 * - GitExecutorToken (L33) - Injection token for the executor.
 * - GIT_CONFIG_OVERRIDES (L38) - Config forced on every git call.
 * - buildInvocationArgs (L44) - Prepends `-c` overrides to git arguments.
 * - ExecFileOutcome (L53) - Raw callback values produced by `execFile`.
 * - interpretExecFileOutcome (L63) - Maps an `execFile` outcome to a result or error.
 * - GitCommandRunner (L111) - Default executor backed by `node:child_process`.
 */

import { execFile } from "node:child_process";

import { Inject, Injectable } from "@nestjs/common";

import { ConfigToken, GitConfig } from "../config/config.types";
import { logGitEvent } from "../logging/git-log";
import { GitCommandError } from "./git-command.error";

export type GitCommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export interface GitCommandExecutor {
  run(args: readonly string[], cwd: string): Promise<GitCommandResult>;
}

export const GitExecutorToken = Symbol("GIT_EXECUTOR");

const MAX_BUFFER_ERROR_CODE = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

/* User config must not colorize output or print raw non-ASCII paths. */
export const GIT_CONFIG_OVERRIDES: readonly string[] = [
  "core.quotePath=true",
  "color.ui=false",
  "color.diff=false"
];

export const buildInvocationArgs = (args: readonly string[], cwd: string): string[] => {
  /*
   * `safe.directory` is set inline so repositories owned by another user
   * (mounted volumes, containers) can be read without global config changes.
   */
  const overrides = [...GIT_CONFIG_OVERRIDES, `safe.directory=${cwd}`];
  return [...overrides.flatMap((entry) => ["-c", entry]), ...args];
};

export type ExecFileOutcome = {
  error: {
    code?: string | number | null;
    killed?: boolean;
    signal?: string | null;
  } | null;
  stdout: string;
  stderr: string;
};

export const interpretExecFileOutcome = (
  outcome: ExecFileOutcome,
  args: readonly string[],
  cwd: string
): GitCommandResult | GitCommandError => {
  /*
   * A numeric code is a normal exit; the caller decides which statuses are
   * failures. Node sets `killed` only when it sent the signal itself, which
   * here means the timeout fired.
   */
  const { error, stdout, stderr } = outcome;
  if (!error) {
    return { exitCode: 0, stdout, stderr };
  }

  /* Node also kills the child when output overflows, so check this first. */
  if (error.code === MAX_BUFFER_ERROR_CODE) {
    return new GitCommandError(
      { reason: "output-limit", args, cwd, exitCode: null, signal: error.signal ?? null, stderr },
      { cause: error }
    );
  }

  if (error.killed) {
    return new GitCommandError(
      { reason: "timeout", args, cwd, exitCode: null, signal: error.signal ?? null, stderr },
      { cause: error }
    );
  }

  if (error.signal) {
    return new GitCommandError(
      { reason: "signaled", args, cwd, exitCode: null, signal: error.signal, stderr },
      { cause: error }
    );
  }

  if (typeof error.code === "number") {
    return { exitCode: error.code, stdout, stderr };
  }

  return new GitCommandError(
    { reason: "spawn", args, cwd, exitCode: null, signal: null, stderr },
    { cause: error }
  );
};

@Injectable()
export class GitCommandRunner implements GitCommandExecutor {
  public constructor(@Inject(ConfigToken) private readonly config: GitConfig) {}

  public run(args: readonly string[], cwd: string): Promise<GitCommandResult> {
    const fullArgs = buildInvocationArgs(args, cwd);
    const startedAt = Date.now();

    return new Promise<GitCommandResult>((resolve, reject) => {
      execFile(
        this.config.gitBinary,
        fullArgs,
        {
          cwd,
          timeout: this.config.execTimeoutMs,
          maxBuffer: this.config.maxBufferBytes,
          encoding: "utf8"
        },
        (error, stdout, stderr) => {
          const outcome = interpretExecFileOutcome({ error, stdout, stderr }, args, cwd);
          const durationMs = Date.now() - startedAt;

          if (outcome instanceof GitCommandError) {
            logGitEvent("error", {
              message: outcome.message,
              reason: outcome.reason,
              args,
              cwd,
              signal: outcome.signal,
              durationMs
            });
            reject(outcome);
            return;
          }

          if (this.config.logCommands) {
            logGitEvent("debug", { args, cwd, exitCode: outcome.exitCode, durationMs });
          }
          resolve(outcome);
        }
      );
    });
  }
}
