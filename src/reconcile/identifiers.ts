/**
 * Identifier assigner and the audit manifest of assigned identifiers.
 */
import ExcelJS from "exceljs";
import { randomUUID } from "node:crypto";
import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";

import type { CellValue, ContentRow, IdentifiedRow } from "../core/types.js";
import { formatCompactDate } from "../payload/builders.js";
import { ID_COLUMN } from "./reconciler.js";

const MANIFEST_DATE_COLUMNS = [
  "update_timestamp",
  "effective_start_date",
  "effective_end_date",
];

/**
 * Stamp each row with a fresh UUID. Identifiers already taken in this run,
 * or listed in `reserved`, are regenerated.
 */
export function assignIdentifiers(
  rows: readonly ContentRow[],
  reserved: Iterable<string> = [],
  generate: () => string = randomUUID,
): IdentifiedRow[] {
  const taken = new Set(reserved);
  return rows.map((row) => {
    let id = generate();
    while (taken.has(id)) id = generate();
    taken.add(id);
    return { ...row, id };
  });
}

function manifestDate(value: CellValue): CellValue {
  return formatCompactDate(value) ?? value;
}

/**
 * Write the identifier manifest workbook: every input column plus `rag_id`,
 * dates rendered as YYYY-MM-DD.
 */
export async function writeManifest(
  rows: readonly IdentifiedRow[],
  path: string,
): Promise<void> {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const column of Object.keys(row.raw)) {
      if (column !== ID_COLUMN && !seen.has(column)) {
        seen.add(column);
        columns.push(column);
      }
    }
  }
  columns.push(ID_COLUMN);

  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();
  const sheet = workbook.addWorksheet("rag");
  sheet.addRow(columns);
  for (const row of rows) {
    sheet.addRow(
      columns.map((column) => {
        if (column === ID_COLUMN) return row.id;
        const value = row.raw[column] ?? null;
        return MANIFEST_DATE_COLUMNS.includes(column) ? manifestDate(value) : value;
      }),
    );
  }

  await mkdir(dirname(path), { recursive: true });
  await workbook.xlsx.writeFile(path);
}
