/**
 * @fileoverview NestJS module exposing the git diff facade.
 *
 * Exports:
 * - GitDiffModule (L26) - Wires config, executor and GitDiffService.
 */

import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { GitCommandRunner, GitExecutorToken } from "./git-command.runner";
import { GitDiffService } from "./git-diff.service";

@Module({
  imports: [ConfigModule],
  providers: [
    GitCommandRunner,
    {
      provide: GitExecutorToken,
      useExisting: GitCommandRunner
    },
    GitDiffService
  ],
  exports: [GitDiffService, GitExecutorToken]
})
export class GitDiffModule {}
