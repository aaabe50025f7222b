/**
 * Record builder: normalizes an identified row into a ContentArtifact.
 */
import type { CellValue, IdentifiedRow } from "../core/types.js";
import { RecordBuildFailedException } from "../core/exceptions.js";
import type { ContentArtifact } from "./models.js";

export const NO_CATEGORY = "-";

/** Integer-like category codes keep their integer form; anything else is "-". */
export function parseCategoryId(value: CellValue): string {
  if (value === null || typeof value === "boolean") return NO_CATEGORY;
  const text = String(value).trim();
  if (text === "" || text === NO_CATEGORY) return NO_CATEGORY;
  const n = Number(text);
  if (!Number.isFinite(n) || !Number.isInteger(n)) return NO_CATEGORY;
  return String(n);
}

/** `YYYYMMDD` → `YYYY-MM-DD`, or null when the value is not such a date. */
export function formatCompactDate(value: CellValue): string | null {
  if (value === null || typeof value === "boolean") return null;
  const m = /^(\d{4})(\d{2})(\d{2})$/.exec(String(value).trim());
  if (!m) return null;
  const [, y, mo, d] = m;
  const date = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d)));
  if (
    date.getUTCFullYear() !== Number(y) ||
    date.getUTCMonth() !== Number(mo) - 1 ||
    date.getUTCDate() !== Number(d)
  ) {
    return null;
  }
  return `${y}-${mo}-${d}`;
}

function text(value: CellValue): string {
  return value === null ? "" : String(value);
}

export class RecordBuilder {
  build(row: IdentifiedRow): ContentArtifact {
    const date = (value: CellValue, column: string): string => {
      const formatted = formatCompactDate(value);
      if (formatted === null) {
        throw new RecordBuildFailedException(
          row.position,
          column,
          `expected a YYYYMMDD date, got ${JSON.stringify(value)}`,
        );
      }
      return formatted;
    };

    const english = text(row.contentEn).trim();
    const content = english
      ? `${text(row.content)} \n\n${english}`
      : text(row.content);

    return {
      id: row.id,
      threadId: text(row.threadId),
      groupId: text(row.groupId),
      updatedOn: date(row.updateTimestamp, "update_timestamp"),
      content,
      embedding: [],
      keywords: [],
      categoryIdLarge: parseCategoryId(row.categoryIdLarge),
      categoryIdMedium: parseCategoryId(row.categoryIdMedium),
      categoryIdSmall: parseCategoryId(row.categoryIdSmall),
      effectiveStartDate: date(row.effectiveStartDate, "effective_start_date"),
      effectiveEndDate: date(row.effectiveEndDate, "effective_end_date"),
      extensions: { extraField1: "", extraField2: "" },
    };
  }

  buildAll(rows: readonly IdentifiedRow[]): ContentArtifact[] {
    return rows.map((row) => this.build(row));
  }
}
