/**
 * Record reconciler: validates merged sources and splits rows into new and
 * superseded.
 */
import type {
  CellValue,
  ContentRow,
  RawRow,
  Reconciliation,
  TabularSource,
} from "../core/types.js";
import { ValidationFailedException } from "../core/exceptions.js";

export const ID_COLUMN = "rag_id";

export const REQUIRED_COLUMNS: readonly string[] = [
  "thread_id",
  "group_id",
  "update_timestamp",
  "content",
  "content_embedding",
  "category_id_large",
  "category_id_medium",
  "category_id_small",
  "effective_start_date",
  "effective_end_date",
];

function isBlank(value: CellValue | undefined): boolean {
  return value === null || value === undefined || String(value).trim() === "";
}

function cell(raw: RawRow, column: string): CellValue {
  return raw[column] ?? null;
}

export function toContentRow(raw: RawRow, position: number, source: string): ContentRow {
  const id = raw[ID_COLUMN];
  return {
    position,
    source,
    ragId: isBlank(id) ? null : String(id).trim(),
    threadId: cell(raw, "thread_id"),
    groupId: cell(raw, "group_id"),
    updateTimestamp: cell(raw, "update_timestamp"),
    content: cell(raw, "content"),
    contentEn: cell(raw, "content_en"),
    categoryIdLarge: cell(raw, "category_id_large"),
    categoryIdMedium: cell(raw, "category_id_medium"),
    categoryIdSmall: cell(raw, "category_id_small"),
    effectiveStartDate: cell(raw, "effective_start_date"),
    effectiveEndDate: cell(raw, "effective_end_date"),
    raw,
  };
}

/** Identity of a row for duplicate detection: every column but the id. */
function duplicateKey(raw: RawRow): string {
  const entries = Object.entries(raw)
    .filter(([column]) => column !== ID_COLUMN)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}

/** Number of rows that have at least one identical sibling. */
export function countDuplicateRows(rows: readonly ContentRow[]): number {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const key = duplicateKey(row.raw);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  let total = 0;
  for (const n of counts.values()) {
    if (n > 1) total += n;
  }
  return total;
}

export class RecordReconciler {
  private requiredColumns: readonly string[];

  constructor(requiredColumns: readonly string[] = REQUIRED_COLUMNS) {
    this.requiredColumns = requiredColumns;
  }

  /** Fail unless every source carries every required column. */
  validate(sources: readonly TabularSource[]): void {
    if (sources.length === 0) {
      throw new ValidationFailedException("no input sources found");
    }
    const problems: string[] = [];
    for (const source of sources) {
      const present = new Set(source.columns);
      const missing = this.requiredColumns.filter((c) => !present.has(c));
      if (missing.length > 0) {
        problems.push(`${source.name} is missing ${missing.join(", ")}`);
      }
    }
    if (problems.length > 0) {
      throw new ValidationFailedException(
        `required columns are missing: ${problems.join("; ")}`,
      );
    }
  }

  reconcile(sources: readonly TabularSource[]): Reconciliation {
    this.validate(sources);

    const newRows: ContentRow[] = [];
    const supersededIds: string[] = [];
    let position = 0;

    for (const source of sources) {
      for (const raw of source.rows) {
        const row = toContentRow(raw, position++, source.name);
        if (row.ragId !== null) {
          supersededIds.push(row.ragId);
        } else {
          newRows.push(row);
        }
      }
    }

    return {
      newRows,
      supersededIds: Object.freeze(supersededIds),
      duplicateCount: countDuplicateRows(newRows),
    };
  }
}
