/**
 * @fileoverview Facade that runs `git diff` and returns typed reports.
 *
 * Exports:
 * - GitDiffService (L29) - numstat/raw/patch reports for a repository path.
 */

import { Inject, Injectable } from "@nestjs/common";

import {
  DiffParseOptions,
  DiffResult,
  NumstatFileRecord,
  PatchFileRecord,
  RawFileRecord
} from "../diff/diff.types";
import { parseNumstatOutput } from "../diff/numstat-parser";
import { parsePatchOutput } from "../diff/patch-parser";
import { parseRawOutput } from "../diff/raw-parser";
import { logGitEvent } from "../logging/git-log";
import { GitCommandError } from "./git-command.error";
import { GitCommandExecutor, GitExecutorToken } from "./git-command.runner";
import { buildDiffArgs, DiffFormat, DiffOptions, diffOptionsSchema, expectsDirstat } from "./git-diff-args";

/* 0 = no differences, 1 = differences (`--no-index`, `--exit-code`); 2+ is a failure. */
const MAX_SUCCESS_EXIT_CODE = 1;

@Injectable()
export class GitDiffService {
  public constructor(@Inject(GitExecutorToken) private readonly executor: GitCommandExecutor) {}

  public async numstat(repoPath: string, options: DiffOptions = {}): Promise<DiffResult<NumstatFileRecord>> {
    /* Per-file line counters plus totals. */
    return this.runReport("numstat", repoPath, options, parseNumstatOutput);
  }

  public async raw(repoPath: string, options: DiffOptions = {}): Promise<DiffResult<RawFileRecord>> {
    /* Exact change kind, modes and object ids per file. */
    return this.runReport("raw", repoPath, options, parseRawOutput);
  }

  public async patch(repoPath: string, options: DiffOptions = {}): Promise<DiffResult<PatchFileRecord>> {
    /* Full unified diff split into per-file blocks. */
    return this.runReport("patch", repoPath, options, parsePatchOutput);
  }

  private async runReport<TResult>(
    format: DiffFormat,
    repoPath: string,
    options: DiffOptions,
    parse: (output: string, parseOptions: DiffParseOptions) => TResult
  ): Promise<TResult> {
    /* Reject bad options before spawning anything. */
    const validated = diffOptionsSchema.parse(options);
    const args = buildDiffArgs(format, validated);
    const result = await this.executor.run(args, repoPath);

    if (result.exitCode > MAX_SUCCESS_EXIT_CODE) {
      const error = new GitCommandError({
        reason: "exit-status",
        args,
        cwd: repoPath,
        exitCode: result.exitCode,
        signal: null,
        stderr: result.stderr
      });
      logGitEvent("error", {
        message: error.message,
        reason: error.reason,
        args,
        cwd: repoPath,
        exitCode: result.exitCode
      });
      throw error;
    }

    return parse(result.stdout, { includeDirstat: expectsDirstat(validated) });
  }
}
