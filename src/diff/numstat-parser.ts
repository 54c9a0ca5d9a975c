/**
 * @fileoverview Parser for `git diff --numstat --shortstat [--dirstat]` output.
 *
 * Exports:
 * - parseNumstatOutput (L80) - Parses the full numstat report into a DiffResult.
 * - parseNumstatLookup (L95) - Builds destination path -> counters map for other parsers.
 */

import {
  buildDiffResult,
  parseDirstat,
  parseRenamePath,
  parseStatValue,
  splitOutputLines,
  splitStatSections,
  unescapePath
} from "./diff-primitives";
import {
  DiffParseOptions,
  DiffResult,
  NumstatCounts,
  NumstatFileRecord,
  NumstatLookup
} from "./diff.types";

type NumstatRow = {
  insertionsToken: string;
  deletionsToken: string;
  pathToken: string;
};

const FIELD_SEPARATOR = "\t";
const BINARY_STAT_PLACEHOLDER = "-";

const splitNumstatRow = (line: string): NumstatRow | null => {
  /*
   * Rows are `<ins>\t<del>\t<path>`. Only the first two tabs separate fields;
   * anything after them belongs to the path token.
   */
  const firstTab = line.indexOf(FIELD_SEPARATOR);
  const secondTab = firstTab < 0 ? -1 : line.indexOf(FIELD_SEPARATOR, firstTab + 1);
  if (secondTab < 0) {
    return null;
  }
  return {
    insertionsToken: line.slice(0, firstTab),
    deletionsToken: line.slice(firstTab + 1, secondTab),
    pathToken: line.slice(secondTab + 1)
  };
};

const toNumstatRecord = (row: NumstatRow): NumstatFileRecord => {
  const { path, srcPath } = parseRenamePath(row.pathToken);
  return {
    format: "numstat",
    path: unescapePath(path),
    srcPath: srcPath === null ? null : unescapePath(srcPath),
    insertions: parseStatValue(row.insertionsToken),
    deletions: parseStatValue(row.deletionsToken)
  };
};

const toNumstatCounts = (row: NumstatRow): NumstatCounts => {
  return {
    insertions: parseStatValue(row.insertionsToken),
    deletions: parseStatValue(row.deletionsToken),
    binary:
      row.insertionsToken === BINARY_STAT_PLACEHOLDER &&
      row.deletionsToken === BINARY_STAT_PLACEHOLDER
  };
};

const parseRows = (lines: readonly string[]): NumstatRow[] => {
  /* Rows without three fields are not numstat rows; skip them. */
  return lines
    .map(splitNumstatRow)
    .filter((row): row is NumstatRow => row !== null);
};

export const parseNumstatOutput = (
  output: string,
  options: DiffParseOptions = {}
): DiffResult<NumstatFileRecord> => {
  const includeDirstat = options.includeDirstat ?? false;
  const lines = splitOutputLines(output).filter((line) => line.length > 0);
  const sections = splitStatSections(lines, includeDirstat);

  return buildDiffResult(
    parseRows(sections.statLines).map(toNumstatRecord),
    sections.shortstatLine,
    includeDirstat ? parseDirstat(sections.dirstatLines) : null
  );
};

export const parseNumstatLookup = (lines: readonly string[]): NumstatLookup => {
  /*
   * Keyed by the post-rename path because raw and patch records identify
   * files by their destination side. A later row for the same path wins.
   */
  const lookup = new Map<string, NumstatCounts>();
  for (const row of parseRows(lines)) {
    const { path } = parseRenamePath(row.pathToken);
    lookup.set(unescapePath(path), toNumstatCounts(row));
  }
  return lookup;
};
