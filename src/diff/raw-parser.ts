/**
 * @fileoverview Parser for `git diff --raw --numstat --shortstat [--dirstat]` output.
 *
 * Exports:
 * - parseRawOutput (L98) - Parses raw rows and enriches them with numstat counters.
 */

import {
  buildDiffResult,
  mapStatusLetter,
  parseDirstat,
  splitOutputLines,
  splitStatSections,
  unescapePath
} from "./diff-primitives";
import { parseNumstatLookup } from "./numstat-parser";
import {
  DiffParseOptions,
  DiffResult,
  DiffStatus,
  FileRef,
  NumstatCounts,
  NumstatLookup,
  RawFileRecord
} from "./diff.types";

type RawRow = {
  srcMode: string;
  dstMode: string;
  srcSha: string;
  dstSha: string;
  status: DiffStatus;
  similarity: number | null;
  srcPath: string;
  dstPath: string;
};

const RAW_LINE_PREFIX = ":";
const NULL_MODE = "000000";
const RAW_LINE_PATTERN = /^:(\S+)\s+(\S+)\s+(\S+)\s+(\S+)\s+(\S.*)$/;
const SIMILARITY_DIGITS_PATTERN = /^\d+$/;

const MISSING_COUNTS: NumstatCounts = { insertions: 0, deletions: 0, binary: false };

const parseStatusToken = (token: string): { status: DiffStatus; similarity: number | null } => {
  /*
   * Status is one letter, optionally followed by a score (`R075`).
   * Only renames and copies keep the score as similarity.
   */
  const status = mapStatusLetter(token.charAt(0));
  const digits = token.slice(1);
  const carriesSimilarity = status === "renamed" || status === "copied";
  const similarity =
    carriesSimilarity && SIMILARITY_DIGITS_PATTERN.test(digits) ? Number.parseInt(digits, 10) : null;
  return { status, similarity };
};

const parseRawRow = (line: string): RawRow | null => {
  const match = RAW_LINE_PATTERN.exec(line);
  if (!match) {
    return null;
  }

  const [, srcMode, dstMode, srcSha, dstSha, rest] = match;
  const [statusToken, firstPath, secondPath] = rest.split("\t");
  if (firstPath === undefined || firstPath.length === 0) {
    return null;
  }

  /* Renames and copies list `<src>\t<dst>`; every other row names one path. */
  const srcPath = unescapePath(firstPath);
  const dstPath = secondPath === undefined ? srcPath : unescapePath(secondPath);
  return { srcMode, dstMode, srcSha, dstSha, ...parseStatusToken(statusToken), srcPath, dstPath };
};

const buildFileRef = (mode: string, sha: string, path: string): FileRef | null => {
  /* An all-zero mode means the file does not exist on that side. */
  if (mode === NULL_MODE) {
    return null;
  }
  return { mode, sha, path };
};

const toRawRecord = (row: RawRow, lookup: NumstatLookup): RawFileRecord => {
  const counts = lookup.get(row.dstPath) ?? MISSING_COUNTS;
  return {
    format: "raw",
    src: buildFileRef(row.srcMode, row.srcSha, row.srcPath),
    dst: buildFileRef(row.dstMode, row.dstSha, row.dstPath),
    status: row.status,
    similarity: row.similarity,
    insertions: counts.insertions,
    deletions: counts.deletions,
    binary: counts.binary
  };
};

export const parseRawOutput = (
  output: string,
  options: DiffParseOptions = {}
): DiffResult<RawFileRecord> => {
  const includeDirstat = options.includeDirstat ?? false;
  const lines = splitOutputLines(output).filter((line) => line.length > 0);
  const rawLines = lines.filter((line) => line.startsWith(RAW_LINE_PREFIX));
  const otherLines = lines.filter((line) => !line.startsWith(RAW_LINE_PREFIX));

  const sections = splitStatSections(otherLines, includeDirstat);
  const lookup = parseNumstatLookup(sections.statLines);

  const files = rawLines
    .map(parseRawRow)
    .filter((row): row is RawRow => row !== null)
    .map((row) => toRawRecord(row, lookup));

  return buildDiffResult(
    files,
    sections.shortstatLine,
    includeDirstat ? parseDirstat(sections.dirstatLines) : null
  );
};
