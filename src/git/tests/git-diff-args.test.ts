/**
 * @fileoverview Tests for diff option validation and argument building.
 */

import { buildDiffArgs, diffOptionsSchema, expectsDirstat } from "../git-diff-args";

describe("buildDiffArgs", () => {
  test("builds default numstat arguments with rename detection", () => {
    expect(buildDiffArgs("numstat", {})).toEqual(["diff", "--numstat", "--shortstat", "-M"]);
  });

  test("orders raw flags, commits and pathspecs", () => {
    const args = buildDiffArgs("raw", {
      cached: true,
      findCopies: "50%",
      dirstat: "lines,cumulative",
      commit1: "HEAD~1",
      pathspecs: ["src", "docs/*.md"]
    });

    expect(args).toEqual([
      "diff",
      "--raw",
      "--numstat",
      "--shortstat",
      "--src-prefix=a/",
      "--dst-prefix=b/",
      "-M",
      "--find-copies=50%",
      "--cached",
      "--dirstat=lines,cumulative",
      "HEAD~1",
      "--",
      "src",
      "docs/*.md"
    ]);
  });

  test("passes tuned rename detection and commit ranges for patches", () => {
    const args = buildDiffArgs("patch", {
      findRenames: "40%",
      findCopiesHarder: true,
      mergeBase: true,
      commit1: "main",
      commit2: "feature"
    });

    expect(args).toEqual([
      "diff",
      "--patch",
      "--numstat",
      "--shortstat",
      "--src-prefix=a/",
      "--dst-prefix=b/",
      "--no-ext-diff",
      "--find-renames=40%",
      "--find-copies-harder",
      "--merge-base",
      "main",
      "feature"
    ]);
  });

  test("disables rename detection explicitly", () => {
    expect(buildDiffArgs("numstat", { findRenames: false, dirstat: true, noIndex: true })).toEqual([
      "diff",
      "--numstat",
      "--shortstat",
      "--no-renames",
      "--no-index",
      "--dirstat"
    ]);
  });

  test("rejects cached combined with noIndex", () => {
    expect(() => buildDiffArgs("raw", { cached: true, noIndex: true })).toThrow(
      "cached and noIndex cannot be combined"
    );
  });
});

describe("diffOptionsSchema", () => {
  test("rejects commits that look like options", () => {
    expect(diffOptionsSchema.safeParse({ commit1: "--output=/tmp/x" }).success).toBe(false);
  });

  test("rejects a second commit without a first one", () => {
    expect(diffOptionsSchema.safeParse({ commit2: "HEAD" }).success).toBe(false);
  });

  test("rejects unknown keys and empty strings", () => {
    expect(diffOptionsSchema.safeParse({ staged: true }).success).toBe(false);
    expect(diffOptionsSchema.safeParse({ pathspecs: [""] }).success).toBe(false);
  });
});

describe("expectsDirstat", () => {
  test("is true for a flag or parameter string only", () => {
    expect(expectsDirstat({ dirstat: true })).toBe(true);
    expect(expectsDirstat({ dirstat: "files" })).toBe(true);
    expect(expectsDirstat({ dirstat: false })).toBe(false);
    expect(expectsDirstat({})).toBe(false);
  });
});
