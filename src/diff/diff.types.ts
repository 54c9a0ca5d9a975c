/**
 * @fileoverview Types and read-only helpers for parsed `git diff` output.
 *
 * Exports:
 * - DiffStatus (L25) - Normalized change kind for one file.
 * - FileRef (L34) - Mode/object id/path of one side of a file change.
 * - NumstatFileRecord (L42) - File entry parsed from `--numstat` output.
 * - RawFileRecord (L51) - File entry parsed from `--raw` output.
 * - PatchFileRecord (L65) - File entry parsed from `--patch` output.
 * - DiffFileRecord (L71) - Union of all file record shapes.
 * - DirstatEntry (L73) - One directory percentage row.
 * - DirstatInfo (L79) - Ordered dirstat rows.
 * - DiffResult (L83) - Aggregate result of one diff invocation.
 * - NumstatCounts (L92) - Per-path counters used to enrich raw/patch records.
 * - NumstatLookup (L99) - Destination path to counters map.
 * - DiffParseOptions (L101) - Flags describing which sections are present.
 * - recordPath (L110) - Path of the file after the change.
 * - recordSourcePath (L117) - Path of the file before the change.
 * - isRenamed / isCopied / isAdded / isDeleted (L124) - Status predicates.
 * - isRegularFile / isExecutable / isSymlink / modeBits (L144) - FileRef mode helpers.
 * - dirstatPercentage (L156) - Lookup of one directory percentage.
 * - dirstatToRecord (L160) - Dirstat rows as a plain object.
 */

export type DiffStatus =
  | "added"
  | "modified"
  | "deleted"
  | "renamed"
  | "copied"
  | "type_changed"
  | "unknown";

export type FileRef = {
  /** Six-digit octal mode, or empty when git did not report one. */
  readonly mode: string;
  /** Abbreviated or full object id, or empty when git did not report one. */
  readonly sha: string;
  readonly path: string;
};

export type NumstatFileRecord = {
  readonly format: "numstat";
  readonly path: string;
  /** Set only when the numstat path token described a rename. */
  readonly srcPath: string | null;
  readonly insertions: number;
  readonly deletions: number;
};

export type RawFileRecord = {
  readonly format: "raw";
  /** Null when the file does not exist before the change. */
  readonly src: FileRef | null;
  /** Null when the file does not exist after the change. */
  readonly dst: FileRef | null;
  readonly status: DiffStatus;
  /** Only renamed/copied records carry a similarity. */
  readonly similarity: number | null;
  readonly insertions: number;
  readonly deletions: number;
  readonly binary: boolean;
};

export type PatchFileRecord = Omit<RawFileRecord, "format"> & {
  readonly format: "patch";
  /** Verbatim per-file block starting at its `diff --git` header. */
  readonly patch: string;
};

export type DiffFileRecord = NumstatFileRecord | RawFileRecord | PatchFileRecord;

export type DirstatEntry = {
  /** Directory as printed by git, including the trailing slash. */
  readonly directory: string;
  readonly percentage: number;
};

export type DirstatInfo = {
  readonly entries: readonly DirstatEntry[];
};

export type DiffResult<TFile extends DiffFileRecord = DiffFileRecord> = {
  readonly filesChanged: number;
  readonly totalInsertions: number;
  readonly totalDeletions: number;
  readonly files: readonly TFile[];
  /** Present only when `--dirstat` output was requested. */
  readonly dirstat: DirstatInfo | null;
};

export type NumstatCounts = {
  readonly insertions: number;
  readonly deletions: number;
  /** True when both numstat columns were the `-` placeholder. */
  readonly binary: boolean;
};

export type NumstatLookup = ReadonlyMap<string, NumstatCounts>;

export type DiffParseOptions = {
  /** Expect a dirstat section after the shortstat line. */
  includeDirstat?: boolean;
};

const REGULAR_FILE_MODE = "100644";
const EXECUTABLE_FILE_MODE = "100755";
const SYMLINK_MODE = "120000";

export const recordPath = (record: DiffFileRecord): string | null => {
  if (record.format === "numstat") {
    return record.path;
  }
  return record.dst?.path ?? record.src?.path ?? null;
};

export const recordSourcePath = (record: DiffFileRecord): string | null => {
  if (record.format === "numstat") {
    return record.srcPath;
  }
  return record.src?.path ?? null;
};

export const isRenamed = (record: DiffFileRecord): boolean => {
  /* Numstat has no status column; a split rename token is the only signal. */
  if (record.format === "numstat") {
    return record.srcPath !== null;
  }
  return record.status === "renamed";
};

export const isCopied = (record: DiffFileRecord): boolean => {
  return record.format !== "numstat" && record.status === "copied";
};

export const isAdded = (record: DiffFileRecord): boolean => {
  return record.format !== "numstat" && record.status === "added";
};

export const isDeleted = (record: DiffFileRecord): boolean => {
  return record.format !== "numstat" && record.status === "deleted";
};

export const isRegularFile = (ref: FileRef): boolean => ref.mode === REGULAR_FILE_MODE;

export const isExecutable = (ref: FileRef): boolean => ref.mode === EXECUTABLE_FILE_MODE;

export const isSymlink = (ref: FileRef): boolean => ref.mode === SYMLINK_MODE;

export const modeBits = (ref: FileRef): number => {
  /* Empty modes (unknown side of a patch) read as zero. */
  const parsed = Number.parseInt(ref.mode, 8);
  return Number.isFinite(parsed) ? parsed : 0;
};

export const dirstatPercentage = (info: DirstatInfo, directory: string): number | null => {
  return info.entries.find((entry) => entry.directory === directory)?.percentage ?? null;
};

export const dirstatToRecord = (info: DirstatInfo): Record<string, number> => {
  return Object.fromEntries(info.entries.map((entry) => [entry.directory, entry.percentage]));
};
