/**
 * Pipeline record types, progress sink and run result.
 */

/** A raw cell value as read from a tabular source. */
export type CellValue = string | number | boolean | null;

/** One row keyed by column header. */
export type RawRow = Record<string, CellValue>;

/** A tabular source after reading: its name, header columns and rows. */
export interface TabularSource {
  name: string;
  columns: string[];
  rows: RawRow[];
}

/** One input record. Rows carrying `ragId` were published by an earlier run. */
export interface ContentRow {
  /** Index of the row across all merged sources, in reading order. */
  position: number;
  source: string;
  ragId: string | null;
  threadId: CellValue;
  groupId: CellValue;
  updateTimestamp: CellValue;
  content: CellValue;
  contentEn: CellValue;
  categoryIdLarge: CellValue;
  categoryIdMedium: CellValue;
  categoryIdSmall: CellValue;
  effectiveStartDate: CellValue;
  effectiveEndDate: CellValue;
  /** Every column as read, including ones the pipeline does not interpret. */
  raw: RawRow;
}

/** A new row stamped with its freshly assigned identifier. */
export interface IdentifiedRow extends ContentRow {
  id: string;
}

/** Result of reconciliation. */
export interface Reconciliation {
  newRows: ContentRow[];
  supersededIds: readonly string[];
  duplicateCount: number;
}

// ---------------------------------------------------------------------------
// Progress
// ---------------------------------------------------------------------------

export interface StatsUpdate {
  recordCount?: number;
  createdCount?: number;
  deletedCount?: number;
}

/**
 * Receives progress from the pipeline. Owned by the caller; the pipeline only
 * ever talks to this interface.
 */
export interface ProgressSink {
  logInfo(step: string, message: string, percent: number): void | Promise<void>;
  logWarning(step: string, message: string, percent: number): void | Promise<void>;
  logError(step: string, message: string, percent: number): void | Promise<void>;
  updateStep(
    step: string,
    stepIndex: number,
    stepPercent: number,
    etaSeconds: number | null,
  ): void | Promise<void>;
  updateStats(stats: StatsUpdate): void | Promise<void>;
}

// ---------------------------------------------------------------------------
// Release / deploy
// ---------------------------------------------------------------------------

export interface ReleaseTag {
  name: string;
  sequence: number;
  /** YYYYMMDD */
  date: string;
  /** Name of the highest existing tag, if any. */
  previous: string | null;
}

export type BuildState =
  | "queued"
  | "running"
  | "success"
  | "unstable"
  | "failed"
  | "aborted";

export interface FlowResult {
  url: string;
  status: number;
  detail: string;
}

export interface RollbackReport {
  reverted: string[];
  failed: { commitId: string; reason: string }[];
}

/** Result returned from IndexPublisher.run(). */
export interface RunResult {
  runId: string;
  recordCount: number;
  jsonFilesCreated: number;
  jsonFilesDeleted: number;
  keywordFailures: number;
  commits: string[];
  tag: ReleaseTag | null;
  buildState: BuildState | null;
  flows: FlowResult[];
  manifestPath: string | null;
}
