/**
 * @fileoverview Tests for NestJS wiring of the git diff module.
 */

import "reflect-metadata";

import { Test } from "@nestjs/testing";

import { GitCommandExecutor, GitCommandResult, GitCommandRunner, GitExecutorToken } from "../git-command.runner";
import { GitDiffModule } from "../git-diff.module";
import { GitDiffService } from "../git-diff.service";

describe("GitDiffModule", () => {
  test("provides the service backed by the child process runner", async () => {
    const moduleRef = await Test.createTestingModule({ imports: [GitDiffModule] }).compile();

    expect(moduleRef.get(GitDiffService)).toBeInstanceOf(GitDiffService);
    expect(moduleRef.get(GitExecutorToken)).toBeInstanceOf(GitCommandRunner);
    await moduleRef.close();
  });

  test("lets callers substitute the executor", async () => {
    /* Replacing the token swaps git execution without touching the service. */
    const run = jest.fn(
      async (_args: readonly string[], _cwd: string): Promise<GitCommandResult> => ({
        exitCode: 0,
        stdout: "-\t-\tlogo.png\n",
        stderr: ""
      })
    );
    const executor: GitCommandExecutor = { run };

    const moduleRef = await Test.createTestingModule({ imports: [GitDiffModule] })
      .overrideProvider(GitExecutorToken)
      .useValue(executor)
      .compile();

    const result = await moduleRef.get(GitDiffService).numstat("/srv/repo");

    expect(run).toHaveBeenCalledWith(["diff", "--numstat", "--shortstat", "-M"], "/srv/repo");
    expect(result.files[0]).toMatchObject({ path: "logo.png", insertions: 0, deletions: 0 });
    await moduleRef.close();
  });
});
