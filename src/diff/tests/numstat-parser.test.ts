/**
 * @fileoverview Tests for numstat report parsing and the numstat lookup map.
 */

import { parseNumstatLookup, parseNumstatOutput } from "../numstat-parser";

describe("parseNumstatOutput", () => {
  test("parses file rows and shortstat totals", () => {
    /* Totals come from the summary line, not from summed rows. */
    const output = "3\t1\tlib/foo.ts\n4 files changed, 3 insertions(+), 1 deletion(-)\n";

    expect(parseNumstatOutput(output)).toEqual({
      filesChanged: 4,
      totalInsertions: 3,
      totalDeletions: 1,
      files: [{ format: "numstat", path: "lib/foo.ts", srcPath: null, insertions: 3, deletions: 1 }],
      dirstat: null
    });
  });

  test("returns zero totals when the summary line is missing", () => {
    const result = parseNumstatOutput("2\t2\tREADME.md\n");

    expect(result.filesChanged).toBe(0);
    expect(result.totalInsertions).toBe(0);
    expect(result.totalDeletions).toBe(0);
    expect(result.files).toHaveLength(1);
  });

  test("parses dirstat rows after the summary when requested", () => {
    /* Dirstat rows follow the shortstat line. */
    const output = [
      "2\t0\tlib/commands/a.ts",
      "1\t1\ttest/unit/b.ts",
      " 2 files changed, 3 insertions(+), 1 deletion(-)",
      " 45.2% lib/commands/",
      " 30.1% test/unit/",
      ""
    ].join("\n");

    const result = parseNumstatOutput(output, { includeDirstat: true });

    expect(result.files.map((file) => file.path)).toEqual(["lib/commands/a.ts", "test/unit/b.ts"]);
    expect(result.dirstat).toEqual({
      entries: [
        { directory: "lib/commands/", percentage: 45.2 },
        { directory: "test/unit/", percentage: 30.1 }
      ]
    });
  });

  test("leaves dirstat unset when it was not requested", () => {
    /* Rows after the summary are ignored without the flag. */
    const output = "1\t0\ta.ts\n 1 file changed, 1 insertion(+)\n 100.0% ./\n";
    expect(parseNumstatOutput(output).dirstat).toBeNull();
  });

  test("returns an empty dirstat when requested but git printed nothing", () => {
    expect(parseNumstatOutput("", { includeDirstat: true }).dirstat).toEqual({ entries: [] });
  });

  test("reports binary files with zero counts", () => {
    /* Binary rows use '-' placeholders for both columns. */
    const result = parseNumstatOutput("-\t-\tassets/logo.png\n");
    expect(result.files[0]).toEqual({
      format: "numstat",
      path: "assets/logo.png",
      srcPath: null,
      insertions: 0,
      deletions: 0
    });
  });

  test("splits brace and simple rename tokens", () => {
    /* Both rename notations yield a source and destination path. */
    const output = ["4\t2\told_dir/{a => b}/file.ts", "0\t0\tlegacy.ts => modern.ts"].join("\n");
    const [braced, simple] = parseNumstatOutput(output).files;

    expect(braced).toMatchObject({ path: "old_dir/b/file.ts", srcPath: "old_dir/a/file.ts" });
    expect(simple).toMatchObject({ path: "modern.ts", srcPath: "legacy.ts" });
  });

  test("splits moves into a subdirectory printed with an empty brace side", () => {
    /* `git mv lib/x.ts lib/sub/x.ts` prints `lib/{ => sub}/x.ts`. */
    const [moved] = parseNumstatOutput("1\t0\tlib/{ => sub}/x.ts\n").files;

    expect(moved).toEqual({
      format: "numstat",
      path: "lib/sub/x.ts",
      srcPath: "lib/x.ts",
      insertions: 1,
      deletions: 0
    });
  });

  test("unescapes quoted paths", () => {
    /* Non-ASCII names arrive as quoted octal escapes. */
    const result = parseNumstatOutput('1\t0\t"caf\\303\\251.txt"\n');
    expect(result.files[0].path).toBe("café.txt");
  });

  test("skips rows without three tab-separated fields", () => {
    /* Warnings mixed into stdout are not file rows. */
    const result = parseNumstatOutput("warning: something odd\n1\t1\tok.ts\n");
    expect(result.files.map((file) => file.path)).toEqual(["ok.ts"]);
  });

  test("returns an empty result for empty input", () => {
    expect(parseNumstatOutput("")).toEqual({
      filesChanged: 0,
      totalInsertions: 0,
      totalDeletions: 0,
      files: [],
      dirstat: null
    });
  });

  test("is deterministic across calls", () => {
    const output = "3\t1\tlib/foo.ts\n1\t0\t{a => b}/x.ts\n 2 files changed, 4 insertions(+), 1 deletion(-)\n";
    expect(parseNumstatOutput(output)).toEqual(parseNumstatOutput(output));
  });
});

describe("parseNumstatLookup", () => {
  test("keys counters by destination path and flags binary rows", () => {
    /* Raw and patch records look counters up by their new path. */
    const lookup = parseNumstatLookup(["5\t2\tsrc/{old => new}/a.ts", "-\t-\tlogo.png"]);

    expect(lookup.size).toBe(2);
    expect(lookup.get("src/new/a.ts")).toEqual({ insertions: 5, deletions: 2, binary: false });
    expect(lookup.get("logo.png")).toEqual({ insertions: 0, deletions: 0, binary: true });
  });

  test("does not flag rows with a single placeholder as binary", () => {
    const lookup = parseNumstatLookup(["-\t3\todd.txt"]);
    expect(lookup.get("odd.txt")).toEqual({ insertions: 0, deletions: 3, binary: false });
  });

  test("keeps the last row for a repeated path", () => {
    /* A later row overwrites an earlier one. */
    const lookup = parseNumstatLookup(["1\t1\ta.ts", "7\t0\ta.ts"]);
    expect(lookup.get("a.ts")).toEqual({ insertions: 7, deletions: 0, binary: false });
  });
});
