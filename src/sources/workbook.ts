/**
 * Workbook (.xlsx) source reader.
 */
import ExcelJS from "exceljs";
import { posix } from "node:path";

import type { CellValue, RawRow, TabularSource } from "../core/types.js";
import { SourceReadFailedException } from "../core/exceptions.js";
import type { StorageBackend } from "../storage/backend.js";
import type { SourceReader, SourceReaderOptions } from "./reader.js";

/** Workbook date cells become compact `YYYYMMDD` strings. */
export function compactDate(date: Date): string {
  const y = date.getUTCFullYear().toString().padStart(4, "0");
  const m = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const d = date.getUTCDate().toString().padStart(2, "0");
  return `${y}${m}${d}`;
}

export function toCellValue(value: ExcelJS.CellValue): CellValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (value instanceof Date) return compactDate(value);
  if ("richText" in value) return value.richText.map((r) => r.text).join("");
  if ("hyperlink" in value) return value.text;
  if ("formula" in value || "sharedFormula" in value) {
    const result = value.result;
    if (result === undefined) return null;
    if (result instanceof Date) return compactDate(result);
    if (typeof result === "object") return null;
    return result;
  }
  // Error cells
  return null;
}

export class WorkbookSourceReader implements SourceReader {
  private sheetName: string;

  constructor(opts: SourceReaderOptions) {
    this.sheetName = opts.sheetName;
  }

  async read(key: string, storage: StorageBackend): Promise<TabularSource> {
    const name = posix.basename(key);
    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.load(Buffer.from(await storage.read(key)));
    } catch (err) {
      throw new SourceReadFailedException(name, String(err));
    }

    const sheet = workbook.getWorksheet(this.sheetName);
    if (!sheet) {
      throw new SourceReadFailedException(
        name,
        `worksheet "${this.sheetName}" not found`,
      );
    }

    const columns: string[] = [];
    const header = sheet.getRow(1);
    for (let c = 1; c <= sheet.columnCount; c++) {
      const label = toCellValue(header.getCell(c).value);
      columns.push(label === null ? "" : String(label).trim());
    }

    const rows: RawRow[] = [];
    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber === 1) return;
      const record: RawRow = {};
      let filled = false;
      columns.forEach((column, i) => {
        if (!column) return;
        const value = toCellValue(row.getCell(i + 1).value);
        if (value !== null && value !== "") filled = true;
        record[column] = value;
      });
      if (filled) rows.push(record);
    });

    return { name, columns: columns.filter((c) => c !== ""), rows };
  }
}
