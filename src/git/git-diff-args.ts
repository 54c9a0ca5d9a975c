/**
 * @fileoverview Validated options and argument lists for `git diff` report formats.
 *
 * Exports:
 * - DiffFormat (L14) - Report formats understood by the parsers.
 * - diffOptionsSchema (L27) - Strict zod schema for caller options.
 * - DiffOptions (L58) - Options accepted by the diff facade.
 * - buildDiffArgs (L83) - Builds git arguments for one format.
 * - expectsDirstat (L79) - Whether the options request a dirstat section.
 */

import { z } from "zod";

export type DiffFormat = "numstat" | "raw" | "patch";

/*
 * Commits are positional operands; a leading dash would turn them into options.
 * Pathspecs go after `--`, so they may start with anything.
 */
const commitSchema = z
  .string()
  .min(1)
  .refine((value) => !value.startsWith("-"), { message: "Commit must not start with '-'" });

const flagOrValueSchema = z.union([z.boolean(), z.string().min(1)]);

export const diffOptionsSchema = z
  .object({
    cached: z.boolean().optional(),
    mergeBase: z.boolean().optional(),
    noIndex: z.boolean().optional(),
    findRenames: flagOrValueSchema.optional(),
    findCopies: flagOrValueSchema.optional(),
    findCopiesHarder: z.boolean().optional(),
    dirstat: flagOrValueSchema.optional(),
    commit1: commitSchema.optional(),
    commit2: commitSchema.optional(),
    pathspecs: z.array(z.string().min(1)).optional()
  })
  .strict()
  .superRefine((options, ctx) => {
    if (options.cached && options.noIndex) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["noIndex"],
        message: "cached and noIndex cannot be combined"
      });
    }
    if (options.commit2 !== undefined && options.commit1 === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["commit2"],
        message: "commit2 requires commit1"
      });
    }
  });

export type DiffOptions = z.infer<typeof diffOptionsSchema>;

const FORMAT_FLAGS: Readonly<Record<DiffFormat, readonly string[]>> = {
  numstat: ["--numstat", "--shortstat"],
  raw: ["--raw", "--numstat", "--shortstat", "--src-prefix=a/", "--dst-prefix=b/"],
  patch: ["--patch", "--numstat", "--shortstat", "--src-prefix=a/", "--dst-prefix=b/", "--no-ext-diff"]
};

/* Rename detection is on unless the caller tunes or disables it. */
const DEFAULT_RENAME_FLAG = "-M";
const NO_RENAMES_FLAG = "--no-renames";

const flagOrValue = (name: string, value: boolean | string | undefined): string[] => {
  if (value === undefined || value === false) {
    return [];
  }
  return value === true ? [name] : [`${name}=${value}`];
};

const flag = (name: string, value: boolean | undefined): string[] => (value ? [name] : []);

export const expectsDirstat = (options: DiffOptions): boolean => {
  return options.dirstat !== undefined && options.dirstat !== false;
};

export const buildDiffArgs = (format: DiffFormat, options: DiffOptions): string[] => {
  /* Re-validate so callers bypassing the service still get checked options. */
  const parsed = diffOptionsSchema.parse(options);

  const renameArgs =
    parsed.findRenames === undefined
      ? [DEFAULT_RENAME_FLAG]
      : parsed.findRenames === false
        ? [NO_RENAMES_FLAG]
        : flagOrValue("--find-renames", parsed.findRenames);
  const pathspecArgs = parsed.pathspecs && parsed.pathspecs.length > 0 ? ["--", ...parsed.pathspecs] : [];

  return [
    "diff",
    ...FORMAT_FLAGS[format],
    ...renameArgs,
    ...flagOrValue("--find-copies", parsed.findCopies),
    ...flag("--find-copies-harder", parsed.findCopiesHarder),
    ...flag("--cached", parsed.cached),
    ...flag("--merge-base", parsed.mergeBase),
    ...flag("--no-index", parsed.noIndex),
    ...flagOrValue("--dirstat", parsed.dirstat),
    ...(parsed.commit1 === undefined ? [] : [parsed.commit1]),
    ...(parsed.commit2 === undefined ? [] : [parsed.commit2]),
    ...pathspecArgs
  ];
};
