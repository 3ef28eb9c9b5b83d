/**
 * Shared pipeline types.
 */

/** A single cell in a tabular snapshot. */
export type CellValue = string | number | boolean | null;

/** One record of a tabular snapshot, keyed by column name. */
export type Row = Record<string, CellValue>;

/** A rectangular dataset: ordered column names plus rows keyed by them. */
export interface Table {
  columns: string[];
  rows: Row[];
}

/** Stage names, in the order the runner invokes them. */
export const STAGE_NAMES = [
  "load_settings",
  "download",
  "export_raw",
  "clean",
  "export_clean",
  "load_warehouse",
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

/** Counters emitted by the clean stage. */
export interface CleanReport {
  input: number;
  output: number;
  /** Records excluded for a missing value. */
  incomplete: number;
  /** Records dropped because a value could not be coerced (lenient mode). */
  rejected: number;
  outOfRange: number;
  duplicates: number;
}

/** Result of a warehouse load. */
export interface LoadReport {
  table: string;
  rows: number;
  historyTable?: string;
}

/** Which snapshot a storage write belongs to. */
export type SnapshotMarker = "raw" | "clean";

/** Optional per-run overrides supplied by the caller. */
export interface RunOptions {
  /** Settings document path; defaults to `settings/<pipeline>.json`. */
  settingsPath?: string;
  /** Merged over the settings document's `parameters`. */
  parameters?: Record<string, unknown>;
  signal?: AbortSignal;
  /** Clock override, mostly for tests. */
  now?: Date;
}
