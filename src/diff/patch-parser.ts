/**
 * @fileoverview Parser for `git diff --patch --numstat --shortstat [--dirstat]` output.
 *
 * The patch body is folded line by line through a small state machine:
 * no current file -> inside a file -> (header or end of input finalizes it).
 *
 * Exports:
 * - parsePatchOutput (L224) - Parses the stat prefix and per-file patch blocks.
 */

import {
  buildDiffResult,
  decodeEscapedPath,
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
  NumstatLookup,
  PatchFileRecord
} from "./diff.types";

type FileSide = {
  path: string | null;
  mode: string | null;
  sha: string;
};

type InProgressFile = {
  src: FileSide;
  dst: FileSide;
  status: DiffStatus;
  similarity: number | null;
  binary: boolean;
  lines: string[];
};

type ScanState = {
  current: InProgressFile | null;
  files: PatchFileRecord[];
};

type MetadataRule = (file: InProgressFile, line: string) => InProgressFile;

const DIFF_HEADER_PREFIX = "diff --git";
const DIFF_HEADER_PATTERN = /^diff --git ("?)a\/(.+?)\1 ("?)b\/(.+?)\3$/;
const INDEX_PATTERN = /^index ([0-9a-f]{4,40})\.\.([0-9a-f]{4,40})( ......)?/;
const FILE_MODE_PATTERN = /^(new|deleted) file mode (......)/;
const OLD_MODE_PATTERN = /^old mode (......)/;
const NEW_MODE_PATTERN = /^new mode (......)/;
const RENAME_PATTERN = /^rename (from|to) (.+)$/;
const COPY_PATTERN = /^copy (from|to) (.+)$/;
const SIMILARITY_PATTERN = /^similarity index (\d+)%$/;
const BINARY_FILES_PATTERN = /^Binary files /;
const GIT_BINARY_PATCH_PATTERN = /^GIT binary patch$/;

/* The first three octal digits of a mode encode the object type. */
const MODE_TYPE_DIGITS = 3;

const EMPTY_COUNTS = { insertions: 0, deletions: 0 };

const openFile = (header: RegExpExecArray, line: string): InProgressFile => {
  return {
    src: { path: decodeEscapedPath(header[2]), mode: null, sha: "" },
    dst: { path: decodeEscapedPath(header[4]), mode: null, sha: "" },
    status: "modified",
    similarity: null,
    binary: false,
    lines: [line]
  };
};

const withTypeChange = (file: InProgressFile): InProgressFile => {
  const srcMode = file.src.mode;
  const dstMode = file.dst.mode;
  if (srcMode === null || dstMode === null) {
    return file;
  }
  const typeChanged = srcMode.slice(0, MODE_TYPE_DIGITS) !== dstMode.slice(0, MODE_TYPE_DIGITS);
  return typeChanged ? { ...file, status: "type_changed" } : file;
};

const applyIndex: MetadataRule = (file, line) => {
  const match = INDEX_PATTERN.exec(line);
  if (!match) {
    return file;
  }

  /* An index mode means the mode did not change; it never overrides explicit ones. */
  const mode = match[3]?.trim();
  const applyMode = mode !== undefined && file.src.mode === null && file.dst.mode === null;
  return {
    ...file,
    src: { ...file.src, sha: match[1], mode: applyMode ? mode : file.src.mode },
    dst: { ...file.dst, sha: match[2], mode: applyMode ? mode : file.dst.mode }
  };
};

const applyFileMode: MetadataRule = (file, line) => {
  const match = FILE_MODE_PATTERN.exec(line);
  if (!match) {
    return file;
  }

  const [, kind, mode] = match;
  if (kind === "new") {
    return { ...file, status: "added", src: { ...file.src, path: null }, dst: { ...file.dst, mode } };
  }
  return { ...file, status: "deleted", src: { ...file.src, mode }, dst: { ...file.dst, path: null } };
};

const applyModeChange: MetadataRule = (file, line) => {
  const oldMode = OLD_MODE_PATTERN.exec(line);
  if (oldMode) {
    return withTypeChange({ ...file, src: { ...file.src, mode: oldMode[1] } });
  }

  const newMode = NEW_MODE_PATTERN.exec(line);
  if (newMode) {
    return withTypeChange({ ...file, dst: { ...file.dst, mode: newMode[1] } });
  }
  return file;
};

const relocationRule = (pattern: RegExp, status: DiffStatus): MetadataRule => {
  return (file, line) => {
    const match = pattern.exec(line);
    if (!match) {
      return file;
    }

    const path = unescapePath(match[2]);
    if (match[1] === "from") {
      return { ...file, status, src: { ...file.src, path } };
    }
    return { ...file, status, dst: { ...file.dst, path } };
  };
};

const applySimilarity: MetadataRule = (file, line) => {
  const match = SIMILARITY_PATTERN.exec(line);
  return match ? { ...file, similarity: Number.parseInt(match[1], 10) } : file;
};

const applyBinary: MetadataRule = (file, line) => {
  const isBinary = BINARY_FILES_PATTERN.test(line) || GIT_BINARY_PATCH_PATTERN.test(line);
  return isBinary ? { ...file, binary: true } : file;
};

/* Every rule sees every line; several can match within one file block. */
const METADATA_RULES: readonly MetadataRule[] = [
  applyIndex,
  applyFileMode,
  applyModeChange,
  relocationRule(RENAME_PATTERN, "renamed"),
  relocationRule(COPY_PATTERN, "copied"),
  applySimilarity,
  applyBinary
];

const toFileRef = (side: FileSide): FileRef | null => {
  if (side.path === null) {
    return null;
  }
  return { mode: side.mode ?? "", sha: side.sha, path: side.path };
};

const finalizeFile = (file: InProgressFile, lookup: NumstatLookup): PatchFileRecord => {
  const lookupPath = file.dst.path ?? file.src.path;
  const counts = (lookupPath === null ? undefined : lookup.get(lookupPath)) ?? EMPTY_COUNTS;
  const carriesSimilarity = file.status === "renamed" || file.status === "copied";

  return {
    format: "patch",
    src: toFileRef(file.src),
    dst: toFileRef(file.dst),
    status: file.status,
    similarity: carriesSimilarity ? file.similarity : null,
    insertions: counts.insertions,
    deletions: counts.deletions,
    binary: file.binary,
    patch: file.lines.join("\n")
  };
};

const scanLine = (state: ScanState, line: string, lookup: NumstatLookup): ScanState => {
  /*
   * `files` and each file's `lines` buffer are local to one scan and only
   * ever appended to; metadata fields are replaced, never mutated.
   */
  const header = DIFF_HEADER_PATTERN.exec(line);
  if (header) {
    if (state.current) {
      state.files.push(finalizeFile(state.current, lookup));
    }
    return { current: openFile(header, line), files: state.files };
  }

  /* Text before the first header belongs to no file. */
  if (!state.current) {
    return state;
  }

  const updated = METADATA_RULES.reduce((file, rule) => rule(file, line), state.current);
  updated.lines.push(line);
  return { current: updated, files: state.files };
};

const scanPatch = (lines: readonly string[], lookup: NumstatLookup): PatchFileRecord[] => {
  const initial: ScanState = { current: null, files: [] };
  const finalState = lines.reduce((state, line) => scanLine(state, line, lookup), initial);
  if (finalState.current) {
    finalState.files.push(finalizeFile(finalState.current, lookup));
  }
  return finalState.files;
};

export const parsePatchOutput = (
  output: string,
  options: DiffParseOptions = {}
): DiffResult<PatchFileRecord> => {
  const includeDirstat = options.includeDirstat ?? false;
  if (output.length === 0) {
    return buildDiffResult<PatchFileRecord>([], null, null);
  }

  const lines = splitOutputLines(output);
  const firstHeader = lines.findIndex((line) => line.startsWith(DIFF_HEADER_PREFIX));
  const bodyStart = firstHeader < 0 ? lines.length : firstHeader;

  const prefixLines = lines.slice(0, bodyStart).filter((line) => line.length > 0);
  const sections = splitStatSections(prefixLines, includeDirstat);
  const lookup = parseNumstatLookup(sections.statLines);

  return buildDiffResult(
    scanPatch(lines.slice(bodyStart), lookup),
    sections.shortstatLine,
    includeDirstat ? parseDirstat(sections.dirstatLines) : null
  );
};
