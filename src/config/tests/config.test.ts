/**
 * @fileoverview Tests for environment configuration loader.
 *
 * Exports:
 * - (none)
 */

import { DEFAULT_EXEC_TIMEOUT_MS, DEFAULT_MAX_BUFFER_BYTES, loadConfig } from "../config";

const setEnv = (env: Record<string, string | undefined>): void => {
  /* Replace process.env entries for test. */
  Object.entries(env).forEach(([key, value]) => {
    if (typeof value === "undefined") {
      delete process.env[key];
      return;
    }
    process.env[key] = value;
  });
};

const clearGitEnv = (): void => {
  setEnv({
    GIT_BINARY: undefined,
    GIT_EXEC_TIMEOUT_MS: undefined,
    GIT_MAX_BUFFER_BYTES: undefined,
    GIT_LOG_COMMANDS: undefined
  });
};

describe("loadConfig", () => {
  /* Start and finish every test from a clean git environment. */
  beforeEach(clearGitEnv);
  afterEach(clearGitEnv);

  it("falls back to defaults when nothing is set", () => {
    expect(loadConfig()).toEqual({
      gitBinary: "git",
      execTimeoutMs: DEFAULT_EXEC_TIMEOUT_MS,
      maxBufferBytes: DEFAULT_MAX_BUFFER_BYTES,
      logCommands: false
    });
  });

  it("parses configuration from environment", () => {
    setEnv({
      GIT_BINARY: " /usr/local/bin/git ",
      GIT_EXEC_TIMEOUT_MS: "5000",
      GIT_MAX_BUFFER_BYTES: "2048",
      GIT_LOG_COMMANDS: "yes"
    });
    const config = loadConfig();

    expect(config.gitBinary).toBe("/usr/local/bin/git");
    expect(config.execTimeoutMs).toBe(5000);
    expect(config.maxBufferBytes).toBe(2048);
    expect(config.logCommands).toBe(true);
  });

  it("rejects non-positive timeouts", () => {
    setEnv({ GIT_EXEC_TIMEOUT_MS: "0" });
    expect(() => loadConfig()).toThrow("GIT_EXEC_TIMEOUT_MS must be a positive integer: 0");
  });

  it("rejects fractional buffer sizes", () => {
    setEnv({ GIT_MAX_BUFFER_BYTES: "10.5" });
    expect(() => loadConfig()).toThrow("GIT_MAX_BUFFER_BYTES must be a positive integer: 10.5");
  });

  it("rejects unknown boolean words", () => {
    setEnv({ GIT_LOG_COMMANDS: "maybe" });
    expect(() => loadConfig()).toThrow("GIT_LOG_COMMANDS must be a boolean: maybe");
  });
});
