/**
 * @fileoverview Shared building blocks for the numstat, raw and patch parsers.
 *
 * Exports:
 * - EMPTY_DIFF_TOTALS (L43) - Shortstat totals used when no summary line exists.
 * - mapStatusLetter (L87) - Maps raw status letters to DiffStatus.
 * - parseStatValue (L91) - Parses one numstat column (`-` for binary files).
 * - parseShortstat (L104) - Extracts totals from the `--shortstat` line.
 * - parseDirstat (L119) - Parses `--dirstat` rows.
 * - decodeEscapedPath (L131) - Decodes git's C-style path escapes.
 * - unescapePath (L166) - Decodes a path token when it is quoted.
 * - parseRenamePath (L180) - Splits `old => new` and `pre{old => new}post` tokens.
 * - splitOutputLines (L199) - Splits command output into lines.
 * - splitStatSections (L208) - Separates numstat, shortstat and dirstat lines.
 * - buildDiffResult (L221) - Assembles the final immutable result.
 */

import {
  DiffFileRecord,
  DiffResult,
  DiffStatus,
  DirstatEntry,
  DirstatInfo
} from "./diff.types";

export type DiffTotals = {
  filesChanged: number;
  insertions: number;
  deletions: number;
};

export type StatSections = {
  statLines: string[];
  shortstatLine: string | null;
  dirstatLines: string[];
};

export type RenamePath = {
  path: string;
  srcPath: string | null;
};

export const EMPTY_DIFF_TOTALS: Readonly<DiffTotals> = Object.freeze({
  filesChanged: 0,
  insertions: 0,
  deletions: 0
});

const BINARY_STAT_PLACEHOLDER = "-";

const STATUS_BY_LETTER: Readonly<Record<string, DiffStatus>> = {
  A: "added",
  M: "modified",
  D: "deleted",
  R: "renamed",
  C: "copied",
  T: "type_changed"
};

const FILES_CHANGED_PATTERN = /(\d+)\s+files?\s+changed/;
const INSERTIONS_PATTERN = /(\d+)\s+insertions?\(\+\)/;
const DELETIONS_PATTERN = /(\d+)\s+deletions?\(-\)/;
const SHORTSTAT_LINE_PATTERN = /^\s*\d+\s+files?\s+changed/;
const DIRSTAT_LINE_PATTERN = /^\s*([\d.]+)%\s+(.+)$/;

/* `.*` before the brace is greedy so the last brace group wins, as git prints one. */
const BRACE_RENAME_PATTERN = /^(.*)\{(.*) => (.*)\}(.*)$/;
const DOUBLED_SEPARATOR_PATTERN = /\/\//g;
const LEADING_SEPARATOR_PATTERN = /^\//;
const SIMPLE_RENAME_PATTERN = /^(.+) => (.+)$/;

const OCTAL_ESCAPE_PATTERN = /^[0-7]{3}/;
const NAMED_ESCAPE_BYTES: Readonly<Record<string, number>> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  e: 0x1b,
  "\\": 0x5c,
  '"': 0x22,
  "'": 0x27
};

export const mapStatusLetter = (letter: string): DiffStatus => {
  return STATUS_BY_LETTER[letter] ?? "unknown";
};

export const parseStatValue = (token: string): number => {
  if (token === BINARY_STAT_PLACEHOLDER) {
    return 0;
  }
  const parsed = Number.parseInt(token, 10);
  return Number.isFinite(parsed) ? parsed : 0;
};

const captureCount = (line: string, pattern: RegExp): number => {
  const match = pattern.exec(line);
  return match ? Number.parseInt(match[1], 10) : 0;
};

export const parseShortstat = (line: string | null): DiffTotals => {
  /*
   * Each phrase is optional: git omits "insertions" or "deletions" when the
   * count is zero, so the three numbers are matched independently.
   */
  if (line === null) {
    return { ...EMPTY_DIFF_TOTALS };
  }
  return {
    filesChanged: captureCount(line, FILES_CHANGED_PATTERN),
    insertions: captureCount(line, INSERTIONS_PATTERN),
    deletions: captureCount(line, DELETIONS_PATTERN)
  };
};

export const parseDirstat = (lines: readonly string[]): DirstatInfo => {
  const entries = lines.flatMap((line): DirstatEntry[] => {
    const match = DIRSTAT_LINE_PATTERN.exec(line);
    if (!match) {
      return [];
    }
    const percentage = Number.parseFloat(match[1]);
    return Number.isFinite(percentage) ? [{ directory: match[2], percentage }] : [];
  });
  return { entries };
};

export const decodeEscapedPath = (text: string): string => {
  /*
   * git quotes paths with non-ASCII bytes as octal escapes of their UTF-8
   * encoding (`\302\265`), so bytes are collected first and decoded once.
   */
  const bytes: number[] = [];
  let index = 0;

  while (index < text.length) {
    const char = text[index];
    if (char === "\\" && index + 1 < text.length) {
      const octal = OCTAL_ESCAPE_PATTERN.exec(text.slice(index + 1, index + 4));
      if (octal) {
        bytes.push(Number.parseInt(octal[0], 8) & 0xff);
        index += 4;
        continue;
      }

      const named = NAMED_ESCAPE_BYTES[text[index + 1]];
      if (named !== undefined) {
        bytes.push(named);
        index += 2;
        continue;
      }
    }

    const codePoint = text.codePointAt(index) ?? 0;
    const literal = String.fromCodePoint(codePoint);
    bytes.push(...Buffer.from(literal, "utf8"));
    index += literal.length;
  }

  return Buffer.from(bytes).toString("utf8");
};

export const unescapePath = (token: string): string => {
  if (token.length < 2 || !token.startsWith('"') || !token.endsWith('"')) {
    return token;
  }
  return decodeEscapedPath(token.slice(1, -1));
};

const joinRenameParts = (prefix: string, part: string, suffix: string): string => {
  /* An empty side (`lib/{ => sub}/x.ts`) leaves `lib//x.ts` behind. */
  return `${prefix}${part}${suffix}`
    .replace(DOUBLED_SEPARATOR_PATTERN, "/")
    .replace(LEADING_SEPARATOR_PATTERN, "");
};

export const parseRenamePath = (token: string): RenamePath => {
  /* Partial renames (`dir/{a => b}/file`) must be tried before whole-path ones. */
  const brace = BRACE_RENAME_PATTERN.exec(token);
  if (brace) {
    const [, prefix, oldPart, newPart, suffix] = brace;
    return {
      path: joinRenameParts(prefix, newPart, suffix),
      srcPath: joinRenameParts(prefix, oldPart, suffix)
    };
  }

  const simple = SIMPLE_RENAME_PATTERN.exec(token);
  if (simple) {
    return { path: simple[2], srcPath: simple[1] };
  }

  return { path: token, srcPath: null };
};

export const splitOutputLines = (text: string): string[] => {
  /* Trailing newlines do not produce trailing empty lines. */
  const lines = text.split("\n");
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
};

export const splitStatSections = (lines: readonly string[], includeDirstat: boolean): StatSections => {
  const shortstatIndex = lines.findIndex((line) => SHORTSTAT_LINE_PATTERN.test(line));
  if (shortstatIndex < 0) {
    return { statLines: [...lines], shortstatLine: null, dirstatLines: [] };
  }

  return {
    statLines: lines.slice(0, shortstatIndex),
    shortstatLine: lines[shortstatIndex],
    dirstatLines: includeDirstat ? lines.slice(shortstatIndex + 1) : []
  };
};

export const buildDiffResult = <TFile extends DiffFileRecord>(
  files: readonly TFile[],
  shortstatLine: string | null,
  dirstat: DirstatInfo | null
): DiffResult<TFile> => {
  const totals = parseShortstat(shortstatLine);
  return {
    filesChanged: totals.filesChanged,
    totalInsertions: totals.insertions,
    totalDeletions: totals.deletions,
    files,
    dirstat
  };
};
