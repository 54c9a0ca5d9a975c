/**
 * @fileoverview Public entry point of the git diff report library.
 */

import "reflect-metadata";

export * from "./diff/diff.types";
export {
  decodeEscapedPath,
  mapStatusLetter,
  parseDirstat,
  parseRenamePath,
  parseShortstat,
  parseStatValue,
  unescapePath
} from "./diff/diff-primitives";
export { parseNumstatLookup, parseNumstatOutput } from "./diff/numstat-parser";
export { parsePatchOutput } from "./diff/patch-parser";
export { parseRawOutput } from "./diff/raw-parser";

export { loadConfig } from "./config/config";
export { ConfigModule } from "./config/config.module";
export { ConfigToken, GitConfig } from "./config/config.types";

export { GitCommandError, GitCommandErrorDetails, GitCommandFailureReason } from "./git/git-command.error";
export {
  buildInvocationArgs,
  GIT_CONFIG_OVERRIDES,
  GitCommandExecutor,
  GitCommandResult,
  GitCommandRunner,
  GitExecutorToken
} from "./git/git-command.runner";
export { buildDiffArgs, DiffFormat, DiffOptions, diffOptionsSchema } from "./git/git-diff-args";
export { GitDiffModule } from "./git/git-diff.module";
export { GitDiffService } from "./git/git-diff.service";
